/**
 * Console helpers shared by the subsystems.
 */

const warnedKeys: Set<string> = new Set();

/** Emit `message` the first time `key` is seen; later calls are dropped. */
export function warnOnce(key: string, message: string): void {
    if (warnedKeys.has(key)) return;
    warnedKeys.add(key);
    console.warn(message);
}

/** Forget which warnings were already emitted (tests, world resets). */
export function resetWarnings(): void {
    warnedKeys.clear();
}
