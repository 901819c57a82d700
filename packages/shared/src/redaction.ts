const REDACTION_PLACEHOLDER = '[REDACTED]';

interface RedactionRule {
  pattern: RegExp;
  replace: (match: string, ...groups: string[]) => string;
}

const whole = () => REDACTION_PLACEHOLDER;

// Log files and provider errors routinely echo credentials back.
const rules: RedactionRule[] = [
  { pattern: /sk-[a-zA-Z0-9]{20,}/g, replace: whole },
  { pattern: /gh[pousr]_[a-zA-Z0-9]{20,}/g, replace: whole },
  { pattern: /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g, replace: whole },
  {
    pattern: /\b(Bearer)\s+[A-Za-z0-9._~+/-]+=*/g,
    replace: (_match, scheme) => `${scheme} ${REDACTION_PLACEHOLDER}`,
  },
  {
    pattern: /\b([A-Za-z_]*(?:token|secret|password|passwd|api_key|apikey))(\s*[=:]\s*)['"]?[^\s'",;]+['"]?/gi,
    replace: (_match, key, separator) => `${key}${separator}${REDACTION_PLACEHOLDER}`,
  },
];

export function redactString(input: string): {
  redacted: string;
  redactionCount: number;
} {
  let redacted = input;
  let redactionCount = 0;

  for (const rule of rules) {
    redacted = redacted.replace(rule.pattern, (match: string, ...rest: unknown[]) => {
      redactionCount++;
      const groups = rest.filter((value): value is string => typeof value === 'string');
      return rule.replace(match, ...groups);
    });
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
