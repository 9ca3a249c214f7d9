/**
 * Standardized fatal error output for CLI commands.
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

/**
 * Print a standardized error message and exit.
 *
 * @param title - Main error message (should be under 80 chars)
 * @param nextSteps - Optional actionable suggestions
 *
 * @example
 * exitWithError('Invalid configuration', [
 *   'Fix .declsort.yaml or pass --config <path>'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  console.error(`✗ ${title}`);

  if (nextSteps && nextSteps.length > 0) {
    console.error('');
    for (const step of nextSteps) {
      console.error(`→ ${step}`);
    }
  }

  process.exit(1);
}
