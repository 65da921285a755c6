export const PROGRAM_NAME = 'prompt-relay';
export const VERSION = '0.1.0';
export const DEFAULT_CHARACTER_ENCODING = 'utf-8';

// Remote inference defaults
export const DEFAULT_API_URL = 'https://api.openai.com/v1/chat/completions';
export const DEFAULT_MODEL = 'gpt-3.5-turbo';
export const DEFAULT_TIMEOUT_SECONDS = 10;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant.';

// Text normalization defaults
export const DEFAULT_STRIP_INPUT = true;
export const DEFAULT_LOWERCASE_INPUT = true;
export const DEFAULT_UPPERCASE_OUTPUT = false;

// Templates
export const DEFAULT_TEMPLATE_DIR = 'prompt_templates';
export const DEFAULT_TEMPLATE = 'default.txt';
export const FALLBACK_TEMPLATE = 'User: {user_input}\nContext: {context}\nResponse:';

// Collaborators
export const DEFAULT_VALIDATE_SCHEMAS = true;
export const DEFAULT_COLLECT_METRICS = true;
export const DEFAULT_METRICS_PORT = 9090;
export const DEFAULT_EXPOSE_METRICS = false;
export const LATENCY_BUCKETS_SECONDS = [0.1, 0.5, 1.0, 2.0, 5.0, 10.0, 30.0] as const;

// Mock inference (no API key configured)
export const MOCK_RESPONSE_PREFIX = '[Development Mode] Mock response for: ';
export const MOCK_PROMPT_PREVIEW_LENGTH = 50;
export const MOCK_COMPLETION_TOKENS = 10;

export const INTERNAL_ERROR_MESSAGE = 'Internal pipeline error';

// HTTP front-end
export const DEFAULT_HTTP_PORT = 8000;
export const DEFAULT_HTTP_HOST = '127.0.0.1';
