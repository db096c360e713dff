import type { LogLevel, RuntimeEventRecord } from "./events";

export type { LogLevel };

export type MinLogLevel = LogLevel | "silent";

const levelRank: Record<MinLogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export type LoggerSinkOptions = {
    minLevel?: MinLogLevel;
    /** destino de cada línea; default stdout/stderr vía console */
    write?: (line: string, level: LogLevel) => void;
};

const consoleWrite = (line: string, level: LogLevel) => {
    // en prod querés stdout/stderr
    if (level === "error") console.error(line);
    else console.log(line);
};

export function shouldLog(level: LogLevel, minLevel: MinLogLevel): boolean {
    return levelRank[level] >= levelRank[minLevel];
}

export function consoleJsonLoggerSink(options: LoggerSinkOptions = {}) {
    const minLevel = options.minLevel ?? "info";
    const write = options.write ?? consoleWrite;

    return (ev: RuntimeEventRecord) => {
        if (ev.type !== "log") return;
        if (!shouldLog(ev.level, minLevel)) return;

        const out = {
            level: ev.level,
            msg: ev.message,
            wallTs: ev.wallTs,
            runtime: ev.runtime,
            scopeId: ev.scopeId,
            ...(ev.fields ?? {}),
        };

        write(JSON.stringify(out), ev.level);
    };
}
