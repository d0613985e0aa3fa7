export type ApiKeyProvider = 'openai' | 'anthropic' | 'google';

/**
 * Report which provider keys are usable. A key counts when it is non-empty
 * and is not the `your_<provider>_api_key_here` placeholder from the sample env file.
 */
export function validateApiKeys(
  keys: Partial<Record<ApiKeyProvider, string>>,
): Record<ApiKeyProvider, boolean> {
  const check = (provider: ApiKeyProvider): boolean => {
    const value = keys[provider];
    return value !== undefined && value.length > 0 && value !== `your_${provider}_api_key_here`;
  };

  return {
    openai: check('openai'),
    anthropic: check('anthropic'),
    google: check('google'),
  };
}

export function formatTimestamp(date: Date = new Date()): string {
  return date.toISOString();
}

/** Parse JSON, returning `fallback` on malformed input. */
export function safeJsonParse(text: string, fallback: unknown = undefined): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return fallback;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
