// Environment configuration for the travel tool gateway
// Load provider credentials, timeouts and orchestration limits from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

const openAiKey = strEnv(process.env.OPENAI_API_KEY);

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 8090),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Language model collaborators (tool decision + result judgment)
  OPENAI_API_KEY: openAiKey,
  DECISION_MODEL: strEnv(process.env.DECISION_MODEL, 'gpt-4.1-mini'),
  JUDGE_MODEL: strEnv(process.env.JUDGE_MODEL, 'gpt-4.1-mini'),
  JUDGE_ENABLED: process.env.JUDGE_ENABLED ? process.env.JUDGE_ENABLED !== 'false' : !!openAiKey,

  // Data providers
  SERPAPI_API_KEY: strEnv(process.env.SERPAPI_API_KEY),
  SERPAPI_BASE_URL: strEnv(process.env.SERPAPI_BASE_URL, 'https://serpapi.com/search.json'),
  LITEAPI_API_KEY: strEnv(process.env.LITEAPI_API_KEY),
  LITEAPI_BASE_URL: strEnv(process.env.LITEAPI_BASE_URL, 'https://api.liteapi.travel/v3.0'),
  OPEN_METEO_BASE_URL: strEnv(process.env.OPEN_METEO_BASE_URL, 'https://api.open-meteo.com/v1/forecast'),
  EXCHANGE_RATE_BASE_URL: strEnv(process.env.EXCHANGE_RATE_BASE_URL, 'https://open.er-api.com/v6/latest'),

  // Dispatcher
  TOOL_REQUEST_LOG_LIMIT: parsePositiveInt(process.env.TOOL_REQUEST_LOG_LIMIT, 2000, 'TOOL_REQUEST_LOG_LIMIT'),
  TOOL_RESPONSE_LOG_LIMIT: parsePositiveInt(process.env.TOOL_RESPONSE_LOG_LIMIT, 5000, 'TOOL_RESPONSE_LOG_LIMIT'),
  TOOL_DEFAULT_TIMEOUT_MS: parsePositiveInt(process.env.TOOL_DEFAULT_TIMEOUT_MS, 15000, 'TOOL_DEFAULT_TIMEOUT_MS'),
  FLIGHT_TIMEOUT_MS: parsePositiveInt(process.env.FLIGHT_TIMEOUT_MS, 15000, 'FLIGHT_TIMEOUT_MS'),
  HOTEL_TIMEOUT_MS: parsePositiveInt(process.env.HOTEL_TIMEOUT_MS, 12000, 'HOTEL_TIMEOUT_MS'),
  HOTEL_DETAILS_TIMEOUT_MS: parsePositiveInt(process.env.HOTEL_DETAILS_TIMEOUT_MS, 6000, 'HOTEL_DETAILS_TIMEOUT_MS'),
  WEATHER_TIMEOUT_MS: parsePositiveInt(process.env.WEATHER_TIMEOUT_MS, 4000, 'WEATHER_TIMEOUT_MS'),
  CURRENCY_TIMEOUT_MS: parsePositiveInt(process.env.CURRENCY_TIMEOUT_MS, 6000, 'CURRENCY_TIMEOUT_MS'),
  PLANNER_TIMEOUT_MS: parsePositiveInt(process.env.PLANNER_TIMEOUT_MS, 5000, 'PLANNER_TIMEOUT_MS'),

  // Orchestration
  FEEDBACK_MAX_ATTEMPTS: parsePositiveInt(process.env.FEEDBACK_MAX_ATTEMPTS, 2, 'FEEDBACK_MAX_ATTEMPTS'),
  FLIGHT_RETURN_FLEX_CAP: parsePositiveInt(process.env.FLIGHT_RETURN_FLEX_CAP, 3, 'FLIGHT_RETURN_FLEX_CAP'),
  FLIGHT_MAX_FLEX_DAYS: parsePositiveInt(process.env.FLIGHT_MAX_FLEX_DAYS, 7, 'FLIGHT_MAX_FLEX_DAYS'),

  // Features
  TOOLS_ENABLED: process.env.TOOLS_ENABLED !== 'false', // Default true
  FLIGHT_TOOLS_ENABLED: process.env.FLIGHT_TOOLS_ENABLED !== 'false',
  HOTEL_TOOLS_ENABLED: process.env.HOTEL_TOOLS_ENABLED !== 'false',
  WEATHER_TOOLS_ENABLED: process.env.WEATHER_TOOLS_ENABLED !== 'false',
  CURRENCY_TOOLS_ENABLED: process.env.CURRENCY_TOOLS_ENABLED !== 'false',
  PLANNER_TOOLS_ENABLED: process.env.PLANNER_TOOLS_ENABLED !== 'false',

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function isProviderConfigured(provider: string): boolean {
  switch (provider) {
    case 'openai':
      return !!env.OPENAI_API_KEY;
    case 'serpapi':
      return !!env.SERPAPI_API_KEY;
    case 'liteapi':
      return !!env.LITEAPI_API_KEY;
    case 'open-meteo':
    case 'exchange-rate':
      return true;
    default:
      return false;
  }
}

export function listConfiguredProviders(): string[] {
  const providers = ['openai', 'serpapi', 'liteapi', 'open-meteo', 'exchange-rate'];
  return providers.filter(isProviderConfigured);
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  const configured = listConfiguredProviders();
  console.log('Travel Tool Gateway Configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  Configured providers: ${configured.join(', ') || 'none'}`);
  console.log(`  Tools enabled: ${env.TOOLS_ENABLED}`);
  console.log(`  Decision model: ${env.DECISION_MODEL}`);
  console.log(`  Judge enabled: ${env.JUDGE_ENABLED} (${env.JUDGE_MODEL})`);
  console.log(`  Feedback max attempts: ${env.FEEDBACK_MAX_ATTEMPTS}`);
  console.log(`  Tool log limits: request ${env.TOOL_REQUEST_LOG_LIMIT}B, response ${env.TOOL_RESPONSE_LOG_LIMIT}B`);
  if (!env.SERPAPI_API_KEY) {
    console.log('  ⚠️  SERPAPI_API_KEY not set - flight searches will report API_ERROR');
  }
  if (!env.LITEAPI_API_KEY) {
    console.log('  ⚠️  LITEAPI_API_KEY not set - hotel searches will report API_ERROR');
  }
}
