/**
 * Formatting helpers for terminal output
 */

/**
 * Shorten a path under the home directory to "~/..."
 */
export function toUserPath(absolutePath: string, home = process.env.HOME): string {
  if (!home) return absolutePath;

  if (absolutePath === home) {
    return "~";
  }

  // Must be followed by a separator: /home/tester is not under /home/test
  if (absolutePath.startsWith(home + "/")) {
    return "~" + absolutePath.slice(home.length);
  }

  return absolutePath;
}

/**
 * "just now", "5m ago", "3h ago", "12d ago", "4mo ago", "2y ago"
 */
export function formatRelativeTime(isoString: string, now: Date = new Date()): string {
  const then = new Date(isoString).getTime();
  if (Number.isNaN(then)) return "unknown";

  const diffMins = Math.floor((now.getTime() - then) / 60000);
  const diffHours = Math.floor(diffMins / 60);
  const diffDays = Math.floor(diffHours / 24);

  if (diffMins < 1) return "just now";
  if (diffMins < 60) return `${diffMins}m ago`;
  if (diffHours < 24) return `${diffHours}h ago`;
  if (diffDays < 30) return `${diffDays}d ago`;
  if (diffDays < 365) return `${Math.floor(diffDays / 30)}mo ago`;

  return `${Math.floor(diffDays / 365)}y ago`;
}
