/**
 * @file process-helpers.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * True while a process with this pid exists.
 */
export function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    // ESRCH: no such process
    return false;
  }
}

/**
 * Sequential ids: `t1`, `t2`, ...
 */
export function sequentialIds(): () => string {
  let next = 0;
  return () => `t${++next}`;
}
