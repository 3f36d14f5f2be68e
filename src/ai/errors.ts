/**
 * Custom AI Error Types
 */

export interface ProviderDiagnostic {
  idx?: number;
  finishReason?: string | undefined;
  hasContent?: boolean;
  partCount?: number;
  [key: string]: unknown;
}

/**
 * Error thrown when an image generation request is blocked by provider safety / policy filters.
 * Repeating the same prompt will be blocked again, so the page is not retried.
 */
export class ImageGenerationBlockedError extends Error {
  public code = 'IMAGE_SAFETY_BLOCKED';
  public provider: string;
  public providerFinishReasons: string[];

  constructor(params: { provider: string; finishReasons: string[]; message?: string }) {
    const reasonStr = params.finishReasons.join(', ');
    super(
      params.message ||
        `Image generation blocked by ${params.provider} safety filters (reason(s): ${reasonStr}).`
    );
    this.name = 'ImageGenerationBlockedError';
    this.provider = params.provider;
    this.providerFinishReasons = params.finishReasons;
  }
}

/**
 * Error thrown when a provider answers without the payload that was asked for
 * (no image part, no text part, unparsable structured output).
 */
export class EmptyProviderResponseError extends Error {
  public provider: string;

  constructor(provider: string, message: string) {
    super(message);
    this.name = 'EmptyProviderResponseError';
    this.provider = provider;
  }
}
