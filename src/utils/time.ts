/**
 * Timing helpers shared by the retry loops and output writers.
 */

/**
 * Resolve after `ms` milliseconds. Resolves immediately for 0.
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Directory-safe run stamp, e.g. `2025-03-14_09-26-53`.
 */
export function runTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

/**
 * Human-readable stamp used in transcript dividers, e.g. `2025-03-14 09:26:53`.
 */
export function displayTimestamp(date: Date = new Date()): string {
  return runTimestamp(date).replace('_', ' ').replace(/-(\d{2})-(\d{2})$/, ':$1:$2');
}

/**
 * A divider line with centred text, e.g. `===== title =====`.
 */
export function divider(text?: string, width: number = 100, character: string = '='): string {
  if (!text) return character.repeat(width);
  const label = ` ${text} `;
  const left = Math.max(0, Math.floor((width - label.length) / 2));
  const right = Math.max(0, width - label.length - left);
  return character.repeat(left) + label + character.repeat(right);
}
