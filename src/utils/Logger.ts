import { LOG_LEVEL } from "../Types.ts";

export class Logger {
    logLevel: LOG_LEVEL;
    scope: string | null;
    constructor(logLevel: LOG_LEVEL, scope: string | null = null) {
        this.logLevel = logLevel;
        this.scope = scope;
    }

    scoped(name: string) {
        return new Logger(this.logLevel, this.scope ? `${this.scope}/${name}` : name);
    }

    getTimestamp() {
        let [date, time] = new Date().toJSON().split("T");
        date = date.replaceAll("-", "/");
        time = time.split(".")[0];
        return `[${date} - ${time}]`;
    }

    private prefix(kind: string) {
        const scope = this.scope ? ` [${this.scope}]` : "";
        return `${this.getTimestamp()}${scope} ${kind}:`;
    }

    debug(...messages: unknown[]) {
        if (this.logLevel > LOG_LEVEL.DEBUG) return;
        console.debug(this.prefix("debug"), ...messages);
    }

    info(...messages: unknown[]) {
        if (this.logLevel > LOG_LEVEL.INFO) return;
        console.info(this.prefix("info"), ...messages);
    }

    log(...messages: unknown[]) {
        if (this.logLevel > LOG_LEVEL.INFO) return;
        console.log(this.prefix("log"), ...messages);
    }

    warn(...messages: unknown[]) {
        if (this.logLevel > LOG_LEVEL.WARN) return;
        console.warn(this.prefix("warn"), ...messages);
    }

    error(...messages: unknown[]) {
        if (this.logLevel > LOG_LEVEL.ERROR) return;
        console.error(this.prefix("error"), ...messages);
    }
}
