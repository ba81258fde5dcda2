/**
 * Logger errors.
 *
 * LogError never reaches the caller of `log()`. It is handed to
 * `onError` and the lifecycle observer instead.
 */


/**
 * Where in the pipeline a record was lost.
 *
 * - format: the message callback threw or the buffer could not grow
 * - io: the sink rejected the write
 */
export type LogErrorKind = 'format' | 'io'


/**
 * A record that was dropped.
 *
 * @example
 * ```typescript
 * init({
 *     onError: (err) => {
 *         if (err.kind === 'io') metrics.increment('log.write_failed')
 *     },
 * })
 * ```
 */
export class LogError extends Error {

    override readonly name = 'LogError' as const

    constructor(
        public readonly kind: LogErrorKind,
        cause: unknown,
    ) {

        const detail = cause instanceof Error ? cause.message : String(cause)

        super(`log ${kind} error: ${detail}`, { cause })
    }
}


/**
 * Invalid logger options or LOG_LEVEL value.
 *
 * Thrown from `init()` and the Logger constructor only.
 */
export class LoggerConfigError extends Error {

    override readonly name = 'LoggerConfigError' as const

    constructor(
        public readonly issues: string[],
    ) {

        super(`Invalid logger configuration: ${issues.join('; ')}`)
    }
}
