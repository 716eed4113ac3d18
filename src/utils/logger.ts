import winston from 'winston';

const { combine, timestamp, printf, colorize } = winston.format;

const SENSITIVE_ENV_PATTERN = /(SECRET|TOKEN|PASSWORD|API_KEY|PRIVATE_KEY)/i;
const SENSITIVE_ASSIGNMENT_PATTERN =
    /\b([A-Za-z0-9_-]*(?:secret|token|password|api[_-]?key)[A-Za-z0-9_-]*)\s*[=:]\s*("[^"]*"|'[^']*'|[^\s,;&]+)/gi;
const MIN_REDACTABLE_LENGTH = 6;

const logFormat = printf(({ level, message, timestamp: ts, module: mod, ...meta }) => {
    const moduleTag = typeof mod === 'string' ? ` [${mod}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(ts)} ${level}${moduleTag} ${String(message)}${metaStr}`;
});

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL ?? 'info',
    silent: process.env.NODE_ENV === 'test' || process.env.VITEST === 'true',
    format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), logFormat),
    transports: [
        new winston.transports.Console({
            format: combine(colorize(), timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), logFormat),
        }),
    ],
});

/**
 * Remove secret material from free text before it is logged or returned to a caller.
 *
 * Two passes: raw values of sensitive-looking environment variables, then
 * `key=value` / `key: value` pairs whose key names a secret.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;

    for (const [name, value] of Object.entries(process.env)) {
        if (!value || value.length < MIN_REDACTABLE_LENGTH || !SENSITIVE_ENV_PATTERN.test(name)) {
            continue;
        }
        scrubbed = scrubbed.split(value).join('[REDACTED]');
    }

    return scrubbed.replace(SENSITIVE_ASSIGNMENT_PATTERN, (_match, key: string) => `${key}=[REDACTED]`);
}

/**
 * Record an operational event. Messages conventionally start with a `[Component]` tag,
 * which is lifted into the log line's module field.
 */
export async function logThought(message: string): Promise<void> {
    const scrubbed = scrubSensitiveText(message);
    const tagged = /^\[([^\]]+)\]\s*(.*)$/s.exec(scrubbed);
    if (tagged) {
        logger.info(tagged[2], { module: tagged[1] });
        return;
    }
    logger.info(scrubbed);
}
