/** What the container engine logs through. `console` satisfies it. */
export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export const consoleLogger: Logger = console;

export const silentLogger: Logger = {
    debug() {},
    info() {},
    warn() {},
    error() {},
};
