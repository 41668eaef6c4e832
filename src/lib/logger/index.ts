/**
 * Tiny structured logger with namespaces.
 *
 * Env (read by the default instance only):
 *  - LOG_ENABLED=0            -> disable logs (default: enabled)
 *  - LOG_LEVEL=debug|info|... -> min level (default: info)
 *  - LOG_JSON=1               -> JSON lines (default: pretty text)
 *  - LOG_SERVICE_NAME=rbdx    -> service tag (optional)
 */

export type LevelName = "trace" | "debug" | "info" | "warn" | "error";

type LevelMap = Record<LevelName, number>;

export interface LogMeta {
    [key: string]: unknown;
    error?: unknown;
    err?: unknown;
}

export interface Logger {
    trace(message: unknown, meta?: LogMeta): void;
    debug(message: unknown, meta?: LogMeta): void;
    info(message: unknown, meta?: LogMeta): void;
    warn(message: unknown, meta?: LogMeta): void;
    error(message: unknown, meta?: LogMeta): void;
    child(namespace: string | string[]): Logger;
}

export type LogWriter = (level: LevelName, line: string) => void;

export type LoggerOptions = {
    enabled?: boolean;
    level?: LevelName;
    json?: boolean;
    service?: string;
    ns?: string | string[];
    write?: LogWriter;
};

export const LEVELS: LevelMap = {
    trace: 10,
    debug: 20,
    info: 30,
    warn: 40,
    error: 50,
};

export function isLevelName(value: string): value is LevelName {
    return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function serializeError(err: unknown): unknown {
    if (!err) return undefined;
    if (err instanceof Error) {
        const extra: Record<string, unknown> = { ...err };
        delete extra.message;
        delete extra.name;
        delete extra.stack;
        return {
            message: err.message,
            stack: err.stack,
            name: err.name,
            ...extra,
        };
    }
    return err;
}

function safeStringify(obj: unknown): string {
    try {
        return JSON.stringify(obj);
    } catch {
        return '{"_":"[unserializable]"}';
    }
}

function joinNamespace(ns?: string | string[]): string {
    if (!ns) return "";
    if (Array.isArray(ns)) return ns.join(":");
    return String(ns);
}

const consoleWriter: LogWriter = (level, line) => {
    if (LEVELS[level] >= LEVELS.error) {
        console.error(line);
    } else if (LEVELS[level] >= LEVELS.warn) {
        console.warn(line);
    } else {
        console.log(line);
    }
};

export function createLogger(options: LoggerOptions = {}): Logger {
    const enabled = options.enabled ?? true;
    const minLevel = LEVELS[options.level ?? "info"];
    const asJson = options.json ?? false;
    const service = options.service ?? "";
    const writeLine = options.write ?? consoleWriter;
    const namespace = joinNamespace(options.ns);

    const write = (lvl: LevelName, msg: unknown, meta?: LogMeta) => {
        if (!enabled || LEVELS[lvl] < minLevel) return;

        const payload = {
            ts: new Date().toISOString(),
            level: lvl,
            ns: namespace || undefined,
            service: service || undefined,
            pid: process.pid,
            msg: String(msg ?? ""),
            ...(meta ? { meta: { ...meta } } : {}),
        };

        // Errors carry no enumerable message/stack, so both formats need them expanded.
        if (payload.meta?.error) payload.meta.error = serializeError(payload.meta.error);
        if (payload.meta?.err) payload.meta.err = serializeError(payload.meta.err);

        if (asJson) {
            writeLine(lvl, safeStringify(payload));
            return;
        }

        const tags = [
            `[${payload.ts}]`,
            service && `[${service}]`,
            `[${lvl.toUpperCase()}]`,
            namespace && `[${namespace}]`,
        ]
            .filter(Boolean)
            .join(" ");

        const tail = payload.meta ? ` ${safeStringify(payload.meta)}` : "";
        writeLine(lvl, `${tags} ${payload.msg}${tail}`);
    };

    const child = (subNs: string | string[]): Logger => {
        const next = Array.isArray(subNs) ? subNs : [String(subNs)];
        const merged = namespace ? [namespace, ...next] : next;
        return createLogger({ ...options, ns: merged });
    };

    return {
        trace: (m, meta) => write("trace", m, meta),
        debug: (m, meta) => write("debug", m, meta),
        info: (m, meta) => write("info", m, meta),
        warn: (m, meta) => write("warn", m, meta),
        error: (m, meta) => write("error", m, meta),
        child,
    };
}

const envLevel = (process.env.LOG_LEVEL || "info").toLowerCase();

const logger = createLogger({
    enabled: process.env.LOG_ENABLED !== "0",
    level: isLevelName(envLevel) ? envLevel : "info",
    json: process.env.LOG_JSON === "1",
    service: process.env.LOG_SERVICE_NAME || "",
});

export default logger;
