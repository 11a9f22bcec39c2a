/**
 * Error Messages with Actionable Suggestions
 *
 * Operator-facing messages include what went wrong, what to do about it,
 * and where an alternative exists, what else to try.
 */

/**
 * Error message builder for consistent formatting
 */
export interface ErrorMessageOptions {
  /** Main error description */
  message: string;
  /** Suggested actions to resolve the issue */
  suggestions?: string[];
  /** Command to run (e.g., npx playwright install) */
  command?: string;
  /** Alternative approaches */
  alternatives?: string[];
}

/**
 * Build a formatted error message with suggestions
 */
export function buildErrorMessage(options: ErrorMessageOptions): string {
  const parts: string[] = [options.message];

  if (options.command) {
    parts.push(`Run: ${options.command}`);
  }

  if (options.suggestions && options.suggestions.length > 0) {
    if (options.suggestions.length === 1) {
      parts.push(options.suggestions[0]);
    } else {
      parts.push('Suggestions:');
      options.suggestions.forEach(s => parts.push(`  - ${s}`));
    }
  }

  if (options.alternatives && options.alternatives.length > 0) {
    if (options.alternatives.length === 1) {
      parts.push(`Alternative: ${options.alternatives[0]}`);
    } else {
      parts.push('Alternatives:');
      options.alternatives.forEach(a => parts.push(`  - ${a}`));
    }
  }

  return parts.join('\n');
}

// =============================================================================
// DEPENDENCY ERRORS
// =============================================================================

/**
 * Error when the Chromium build Playwright drives is missing
 */
export function browserNotInstalledError(reason: string): string {
  return buildErrorMessage({
    message: `Could not launch Chromium: ${reason}`,
    command: 'npx playwright install chromium',
  });
}

// =============================================================================
// SESSION ERRORS
// =============================================================================

/**
 * Warning when the recorder continues without an authenticated session
 */
export function loginNotCompletedMessage(steps: number): string {
  return buildErrorMessage({
    message: `Login did not complete within ${steps} analysis cycles.`,
    suggestions: [
      'Continuing unauthenticated; captured requests may be rejected',
      'Log in manually in the browser window and re-run to reuse the session',
    ],
    alternatives: ['Raise MAX_LOGIN_STEPS for multi-page login flows'],
  });
}

// =============================================================================
// TOOL ERRORS
// =============================================================================

/**
 * Error when an unknown tool is requested
 */
export function unknownToolError(toolName: string, availableTools: string[]): string {
  const similar = findSimilarStrings(toolName, availableTools, 3);
  return buildErrorMessage({
    message: `Unknown tool: "${toolName}".`,
    suggestions: similar.length > 0
      ? [`Did you mean: ${similar.join(', ')}?`]
      : undefined,
    alternatives: [
      `Available tools: ${availableTools.slice(0, 10).join(', ')}${availableTools.length > 10 ? '...' : ''}`,
    ],
  });
}

/**
 * Error when the generated tool module does not export a register function
 */
export function invalidToolModuleError(modulePath: string): string {
  return buildErrorMessage({
    message: `Tool module "${modulePath}" does not export a register(host) function.`,
    suggestions: [
      'Export `function register(host) { host.registerTool(name, handler) }` from the module',
    ],
  });
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Find strings similar to target (for "did you mean" suggestions)
 */
export function findSimilarStrings(target: string, candidates: string[], maxResults: number): string[] {
  const targetLower = target.toLowerCase();

  return candidates
    .map(candidate => ({
      candidate,
      distance: levenshteinDistance(targetLower, candidate.toLowerCase()),
    }))
    .filter(({ distance }) => distance <= 3)
    .sort((a, b) => a.distance - b.distance)
    .slice(0, maxResults)
    .map(({ candidate }) => candidate);
}

function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  const matrix: number[][] = [];

  for (let i = 0; i <= b.length; i++) {
    matrix[i] = [i];
  }
  for (let j = 0; j <= a.length; j++) {
    matrix[0][j] = j;
  }

  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      const cost = a[j - 1] === b[i - 1] ? 0 : 1;
      matrix[i][j] = Math.min(
        matrix[i - 1][j] + 1,
        matrix[i][j - 1] + 1,
        matrix[i - 1][j - 1] + cost
      );
    }
  }

  return matrix[b.length][a.length];
}
