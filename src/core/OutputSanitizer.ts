/**
 * OutputSanitizer - Redacts secrets before text is written to disk.
 *
 * Raw LLM responses and provider errors can echo request headers or
 * environment values back. Everything the generation logger stores
 * passes through here first.
 *
 * Singleton pattern - use getSanitizer() to access.
 */

interface SanitizationPattern {
  regex: RegExp;
  replacement: string;
  description: string;
}

export class OutputSanitizer {
  private static instance: OutputSanitizer | undefined;
  private patterns: SanitizationPattern[];
  private enabled: boolean = true;

  private constructor() {
    this.patterns = [
      // API Keys - Anthropic (sk-ant-...)
      {
        regex: /sk-ant-[A-Za-z0-9-_]{40,}/g,
        replacement: 'sk-ant-***REDACTED***',
        description: 'Anthropic API key'
      },
      {
        regex: /sk-[A-Za-z0-9-_]{40,}/g,
        replacement: 'sk-***REDACTED***',
        description: 'Generic sk- API key'
      },
      // Bearer Tokens
      {
        regex: /Bearer\s+[A-Za-z0-9._-]{20,}/gi,
        replacement: 'Bearer ***REDACTED***',
        description: 'Bearer token'
      },
      {
        regex: /eyJ[A-Za-z0-9_-]+\.eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g,
        replacement: '[JWT_REDACTED]',
        description: 'JWT token'
      },
      // Credentials embedded in URLs (e.g. a proxied Ollama endpoint)
      {
        regex: /:\/\/([^:/\s]+):([^@\s]{8,})@/g,
        replacement: '://***:***@',
        description: 'URL credentials'
      },
      {
        regex: /(api_key|apikey|api-key|x-api-key|token|secret)\s*[:=]\s*['"][^'"]{8,}['"]/gi,
        replacement: '$1: "***REDACTED***"',
        description: 'Inline secret assignment'
      },
      {
        regex: /(ANTHROPIC_API_KEY)\s*=\s*\S+/g,
        replacement: '$1=***REDACTED***',
        description: 'Environment variable'
      }
    ];
  }

  /**
   * Get the singleton instance.
   */
  static getInstance(): OutputSanitizer {
    if (!OutputSanitizer.instance) {
      OutputSanitizer.instance = new OutputSanitizer();
    }
    return OutputSanitizer.instance;
  }

  /**
   * Sanitize text by redacting any detected secrets.
   */
  sanitize(text: string): string {
    if (!this.enabled || !text) {
      return text;
    }

    let sanitized = text;
    for (const pattern of this.patterns) {
      sanitized = sanitized.replace(pattern.regex, pattern.replacement);
    }
    return sanitized;
  }

  /**
   * Sanitize an Error object - returns a new Error with sanitized message.
   */
  sanitizeError(error: Error): Error {
    if (!this.enabled) {
      return error;
    }

    const sanitizedError = new Error(this.sanitize(error.message));
    sanitizedError.name = error.name;
    if (error.stack) {
      sanitizedError.stack = this.sanitize(error.stack);
    }
    return sanitizedError;
  }

  /**
   * Enable or disable sanitization (tests toggle this).
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Test if text contains any detectable secrets.
   */
  containsSecrets(text: string): boolean {
    for (const pattern of this.patterns) {
      pattern.regex.lastIndex = 0;
      const found = pattern.regex.test(text);
      pattern.regex.lastIndex = 0;
      if (found) {
        return true;
      }
    }
    return false;
  }
}

/**
 * Get the singleton OutputSanitizer instance.
 */
export function getSanitizer(): OutputSanitizer {
  return OutputSanitizer.getInstance();
}

/**
 * Convenience function to sanitize text.
 */
export function sanitize(text: string): string {
  return getSanitizer().sanitize(text);
}
