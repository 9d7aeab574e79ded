import { INJECTION_DELIMITERS, type SecuritySettings } from '@koboldgate/core';
import { CapabilityError } from '@koboldgate/runtime';

/**
 * Strip known delimiter tokens, then hard-truncate to `maxLength`
 */
export function sanitizePrompt(prompt: string, maxLength: number): string {
  let sanitized = prompt;
  for (const token of INJECTION_DELIMITERS) {
    sanitized = sanitized.split(token).join('');
  }
  return sanitized.length > maxLength ? sanitized.slice(0, maxLength) : sanitized;
}

/**
 * Apply the configured prompt policy; throws when an unsanitized prompt is too long
 */
export function preparePrompt(prompt: string, security: SecuritySettings): string {
  const text = security.dataSanitization
    ? sanitizePrompt(prompt, security.maxPromptLength)
    : prompt;
  if (text.length > security.maxPromptLength) {
    throw new CapabilityError(`Prompt exceeds maximum length of ${security.maxPromptLength}`);
  }
  return text;
}

export function capTokens(requested: number, security: SecuritySettings): number {
  return Math.min(requested, security.maxResponseLength);
}
