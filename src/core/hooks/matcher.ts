/**
 * HookMatcher
 *
 * Decides whether a hook's matcher applies to an event. Two kinds of
 * matcher are supported:
 * - tool patterns, regexes anchored to the whole tool name
 *   (e.g. "Edit|Write|MultiEdit", ".*Edit")
 * - path patterns, globs matched against the event's file path
 *   (e.g. "*.ts", "*.test.ts", "src/**\/*.tsx", "config/*.json")
 * Any other matcher that misses the tool name is still tried against the
 * file path, first as a basename glob ("package.json", ".env") and then as
 * an anchored regex (".*\.env"). An empty matcher or "*" applies to
 * every event.
 */

import path from 'path';
import { minimatch } from 'minimatch';

export interface MatchTarget {
  toolName?: string;
  filePath?: string;
}

const EXTENSION_GLOB = /^\*(?:\.[\w-]+)+$|^\*(?:\.[\w-]+)*\.\{[\w.,-]+\}$/;

/**
 * Whether a matcher should be read as a file glob rather than a tool regex
 */
export function isPathPattern(pattern: string): boolean {
  return pattern.includes('/') || pattern.includes('**') || EXTENSION_GLOB.test(pattern);
}

export function isMatchAll(pattern: string): boolean {
  const trimmed = pattern.trim();
  return trimmed === '' || trimmed === '*';
}

export class HookMatcher {
  /**
   * @param projectDir Root that relative globs such as "src/**" are anchored to
   */
  constructor(private readonly projectDir?: string) {}

  /**
   * Check if a tool name matches a matcher pattern
   * @param matcherPattern Regex pattern (e.g., "Edit|Write|MultiEdit")
   * @param toolName The tool name to check
   */
  matchesTool(matcherPattern: string, toolName: string): boolean {
    if (!matcherPattern || !toolName) {
      return false;
    }

    try {
      const regex = new RegExp(`^(?:${matcherPattern})$`);
      return regex.test(toolName);
    } catch {
      // Invalid regex never matches
      return false;
    }
  }

  /**
   * Check if a file path matches a glob. Patterns without a slash match
   * the basename; others are also tried against the path relative to
   * the project directory.
   */
  matchesPath(pattern: string, filePath: string): boolean {
    if (!pattern || !filePath) {
      return false;
    }

    const options = { dot: true, matchBase: true };
    if (minimatch(filePath, pattern, options)) {
      return true;
    }

    if (this.projectDir && path.isAbsolute(filePath)) {
      const relative = path.relative(this.projectDir, filePath);
      if (relative && !relative.startsWith('..') && !path.isAbsolute(relative)) {
        return minimatch(relative.split(path.sep).join('/'), pattern, options);
      }
    }

    return false;
  }

  /**
   * Check a file path against an anchored regex: the basename, the path
   * relative to the project directory, or the path as given
   */
  matchesPathRegex(pattern: string, filePath: string): boolean {
    if (!pattern || !filePath) {
      return false;
    }

    let regex: RegExp;
    try {
      regex = new RegExp(`^(?:${pattern})$`);
    } catch {
      return false;
    }

    const candidates = [path.basename(filePath), filePath];
    if (this.projectDir && path.isAbsolute(filePath)) {
      const relative = path.relative(this.projectDir, filePath);
      if (relative && !relative.startsWith('..')) {
        candidates.push(relative.split(path.sep).join('/'));
      }
    }
    return candidates.some((candidate) => regex.test(candidate));
  }

  matches(pattern: string, target: MatchTarget): boolean {
    if (isMatchAll(pattern)) {
      return true;
    }

    const trimmed = pattern.trim();
    if (isPathPattern(trimmed)) {
      return target.filePath !== undefined && this.matchesPath(trimmed, target.filePath);
    }
    if (target.toolName !== undefined && this.matchesTool(trimmed, target.toolName)) {
      return true;
    }
    if (target.filePath === undefined) {
      return false;
    }
    return this.matchesPath(trimmed, target.filePath) || this.matchesPathRegex(trimmed, target.filePath);
  }
}
