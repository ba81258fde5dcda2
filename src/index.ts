/**
 * slimlog
 *
 * Small synchronous logger: colored level tags, optional timestamps,
 * targets and key=value fields, one write per line.
 *
 * @example
 * ```typescript
 * import { init, createLogger } from 'slimlog'
 *
 * init({ level: 'debug', color: 'auto', timestamps: true })
 *
 * const log = createLogger('net')
 * log.info('connected', { host: 'db-1' })
 * // INFO 10:30:00.123 [net] connected host=db-1
 * ```
 */
export * from './core/index.js';
