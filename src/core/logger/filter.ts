/**
 * Level Filtering
 *
 * Decides whether a record is worth formatting. Runs before any
 * other pipeline work, so it must not allocate.
 *
 * Rules:
 * - a per-target override (longest matching prefix) replaces the global minimum
 * - a record passes when its priority is at or above the minimum
 * - `off` blocks everything
 */
import { LEVEL_FILTERS, LEVEL_PRIORITY, type Level, type LevelFilter } from './types.js';

/**
 * Characters that end a target prefix. `db` matches `db`, `db:pool`,
 * `db.pool` and `db/pool`, but not `dbx`.
 */
const SEPARATORS = new Set([':', '.', '/']);

/**
 * Check a level against a minimum.
 *
 * @example
 * ```typescript
 * isLevelEnabled('warn', 'info')  // true
 * isLevelEnabled('debug', 'info') // false
 * isLevelEnabled('error', 'off')  // false
 * ```
 */
export function isLevelEnabled(level: Level, minimum: LevelFilter): boolean {

    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minimum];

}

/**
 * Check whether `target` falls under `prefix`.
 */
export function matchesTarget(target: string, prefix: string): boolean {

    if (!target.startsWith(prefix)) {

        return false;

    }

    if (target.length === prefix.length) {

        return true;

    }

    return SEPARATORS.has(target.charAt(prefix.length));

}

/**
 * Per-target minimum levels.
 *
 * Prefixes are sorted longest first once, at construction, so the
 * first match during lookup is the most specific one.
 */
export class TargetLevels {

    readonly #prefixes: string[];
    readonly #priorities: number[];

    constructor(targets: Record<string, LevelFilter> = {}) {

        const entries = Object.entries(targets).sort(([a], [b]) => b.length - a.length);

        this.#prefixes = entries.map(([prefix]) => prefix);
        this.#priorities = entries.map(([, level]) => LEVEL_PRIORITY[level]);

    }

    get size(): number {

        return this.#prefixes.length;

    }

    /**
     * The overrides as a plain prefix-to-level map.
     */
    toRecord(): Record<string, LevelFilter> {

        const targets: Record<string, LevelFilter> = {};

        this.#prefixes.forEach((prefix, i) => {

            const priority = this.#priorities[i];

            targets[prefix] = priority === undefined ? 'off' : LEVEL_FILTERS[priority] ?? 'off';

        });

        return targets;

    }

    /**
     * Minimum priority for a target.
     *
     * @returns undefined when no override applies
     */
    lookup(target: string): number | undefined {

        for (let i = 0; i < this.#prefixes.length; i++) {

            const prefix = this.#prefixes[i];

            if (prefix !== undefined && matchesTarget(target, prefix)) {

                return this.#priorities[i];

            }

        }

        return undefined;

    }

}
