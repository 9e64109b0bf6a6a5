import { Event } from 'microevent.ts';

export const enum LogLevel {
    error = 0,
    warning = 1,
    info = 2,
    debug = 3,
}

export type PrintCallback = (message: string) => void;

export class System {
    constructor(private printCb: PrintCallback, private readonly logLevel = LogLevel.info) {}

    log(message: string, level = LogLevel.info): void {
        if (level > this.logLevel) return;

        this.printCb(message);
    }

    error(message: string): void {
        this.log(`error: ${message}`, LogLevel.error);
    }

    warning(message: string): void {
        this.log(`warning: ${message}`, LogLevel.warning);
    }

    info(message: string): void {
        this.log(message, LogLevel.info);
    }

    debug(message: string): void {
        this.log(message, LogLevel.debug);
    }

    // Debugger stop: breakpoints and bus traps end up here and interrupt the running frame.
    trap(message: string): void {
        this.isTrap = true;
        this.trapMessage = message;

        this.onTrap.dispatch(message);
    }

    getTrapMessage(): string {
        return this.trapMessage;
    }

    clearTrap(): void {
        this.isTrap = false;
        this.trapMessage = '';
    }

    readonly onTrap = new Event<string>();
    isTrap = false;

    private trapMessage = '';
}
