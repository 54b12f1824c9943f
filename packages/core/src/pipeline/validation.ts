import type { ValidationConfig, ValidationMode } from '@constify/shared';
import { hasLiteralOutsideComment } from '@constify/repo';

export interface ValidationFinding {
  check: 'unchanged' | 'literals-dropped';
  mode: Exclude<ValidationMode, 'accept'>;
  message: string;
}

/**
 * Sanity checks on a rewrite before it is committed. Checks set to `accept`
 * are not reported.
 */
export function checkRewrite(
  source: string,
  rewritten: string,
  config: ValidationConfig,
): ValidationFinding[] {
  const findings: ValidationFinding[] = [];

  if (config.onUnchanged !== 'accept' && rewritten === source) {
    findings.push({
      check: 'unchanged',
      mode: config.onUnchanged,
      message: 'Rewritten text is identical to the original',
    });
  }

  if (
    config.onLiteralsDropped !== 'accept' &&
    hasLiteralOutsideComment(source) &&
    !hasLiteralOutsideComment(rewritten)
  ) {
    findings.push({
      check: 'literals-dropped',
      mode: config.onLiteralsDropped,
      message: 'Rewritten text has no string literals outside comments',
    });
  }

  return findings;
}
