const REDACTION_PLACEHOLDER = '[REDACTED]';

// Common API key prefixes and patterns
const apiKeyPatterns = [
  /sk-ant-[a-zA-Z0-9-]{20,}/g, // Anthropic style
  /sk-[a-zA-Z0-9]{20,}/g, // OpenAI style
  /gh[pousr]_[a-zA-Z0-9]{20,}/g, // GitHub token
];

// Bearer credentials as they appear in headers or error messages
const bearerPattern = /Bearer\s+[A-Za-z0-9._~+/=-]+/g;

// Patterns for environment variables
const envVarPatterns = [/(?:TOKEN|SECRET|API_KEY)\s*=\s*['"]?([a-zA-Z0-9_-]+)['"]?/g];

const allPatterns = [...apiKeyPatterns, bearerPattern, ...envVarPatterns];

// Object keys whose values are always secrets
const SECRET_KEYS = new Set(['api_key', 'apiKey', 'authorization', 'Authorization']);

export function redactString(input: string): {
  redacted: string;
  redactionCount: number;
} {
  let redacted = input;
  let redactionCount = 0;

  for (const pattern of allPatterns) {
    const matches = redacted.match(pattern);
    if (matches) {
      redactionCount += matches.length;
      redacted = redacted.replace(pattern, REDACTION_PLACEHOLDER);
    }
  }

  return { redacted, redactionCount };
}

export function redactUnknown(input: unknown): {
  redacted: unknown;
  redactionCount: number;
} {
  if (typeof input === 'string') {
    return redactString(input);
  }

  if (Array.isArray(input)) {
    let totalRedactions = 0;
    const redactedArray = input.map((item) => {
      const { redacted, redactionCount } = redactUnknown(item);
      totalRedactions += redactionCount;
      return redacted;
    });
    return { redacted: redactedArray, redactionCount: totalRedactions };
  }

  if (typeof input === 'object' && input !== null) {
    let totalRedactions = 0;
    const redactedObj: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      if (SECRET_KEYS.has(key) && value !== undefined && value !== null) {
        redactedObj[key] = REDACTION_PLACEHOLDER;
        totalRedactions += 1;
        continue;
      }
      const { redacted, redactionCount } = redactUnknown(value);
      totalRedactions += redactionCount;
      redactedObj[key] = redacted;
    }
    return { redacted: redactedObj, redactionCount: totalRedactions };
  }

  return { redacted: input, redactionCount: 0 };
}

export function redact(input: unknown): unknown {
  return redactUnknown(input).redacted;
}

/**
 * Redacts a value destined for a log sink.
 */
export function redactForLogs(input: unknown): unknown {
  return redact(input);
}
