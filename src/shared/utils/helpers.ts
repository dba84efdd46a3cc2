/**
 * Safely extract an error message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export class Helpers {

  static maskSensitiveData(text: string, visibleChars: number = 3): string {
    if (!text || text.length <= visibleChars) {
      return '*'.repeat(text.length);
    }
    return text.substring(0, visibleChars) + '*'.repeat(text.length - visibleChars);
  }

  /**
   * Shorten a long value for display, e.g. a bearer token in CLI output.
   */
  static truncate(text: string, maxLength: number = 50): string {
    return text.length > maxLength ? `${text.substring(0, maxLength)}...` : text;
  }

  static formatAmount(amount: number): string {
    return `$${amount.toFixed(2)}`;
  }

  static delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
