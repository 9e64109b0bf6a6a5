import { PALETTES } from '../emulator/palette';

export const DEFAULT_FRAMES = 300;

export interface CliOptions {
    rom: string;
    frames: number;
    realtime: boolean;
    speed: number;
    screenshot: string | undefined;
    reference: string | undefined;
    serial: boolean;
    untilSerial: string | undefined;
    quiet: boolean;
    palette: string;
}

export class UsageError extends Error {}

export const USAGE = `usage: dotmatrix [options] <rom>

options:
  --frames=N            number of frames to run (default ${DEFAULT_FRAMES})
  --realtime            pace emulation to real time
  --speed=X             speed factor for --realtime (default 1)
  --screenshot=FILE     write the last frame as PNG
  --reference=FILE      compare the last frame against a PNG
  --serial              echo serial output
  --until-serial=TEXT   stop once serial output contains TEXT, fail if it never does
  --palette=NAME        screen palette: ${Object.keys(PALETTES).join(', ')} (default classic)
  --quiet               only log errors`;

export function uintval<T>(value: T): number | undefined;
export function uintval<T>(value: T, defaultValue: number): number;
export function uintval<T>(value: T, defaultValue?: number | undefined): number | undefined {
    if (typeof value === 'number') return value;
    if (typeof value !== 'string') return defaultValue;

    const parsed = value.startsWith('0x') ? parseInt(value.substring(2), 16) : parseInt(value, 10);

    return isNaN(parsed) || parsed < 0 ? defaultValue : parsed;
}

export function floatval<T>(value: T): number | undefined;
export function floatval<T>(value: T, defaultValue: number): number;
export function floatval<T>(value: T, defaultValue?: number | undefined): number | undefined {
    if (typeof value === 'number') return value;
    if (typeof value !== 'string') return defaultValue;

    const parsed = parseFloat(value);

    return isNaN(parsed) || parsed < 0 ? defaultValue : parsed;
}

export function parseOptions(argv: ReadonlyArray<string>): CliOptions {
    const options: CliOptions = {
        rom: '',
        frames: DEFAULT_FRAMES,
        realtime: false,
        speed: 1,
        screenshot: undefined,
        reference: undefined,
        serial: false,
        untilSerial: undefined,
        quiet: false,
        palette: 'classic',
    };

    const positional: Array<string> = [];

    for (const arg of argv) {
        if (!arg.startsWith('--')) {
            positional.push(arg);
            continue;
        }

        const separator = arg.indexOf('=');
        const name = separator < 0 ? arg.substring(2) : arg.substring(2, separator);
        const value = separator < 0 ? undefined : arg.substring(separator + 1);

        switch (name) {
            case 'frames': {
                const frames = uintval(value);
                if (frames === undefined || frames === 0) throw new UsageError(`invalid frame count: ${value}`);

                options.frames = frames;
                break;
            }

            case 'speed': {
                const speed = floatval(value);
                if (speed === undefined || speed === 0) throw new UsageError(`invalid speed: ${value}`);

                options.speed = speed;
                break;
            }

            case 'screenshot':
                options.screenshot = requireValue(name, value);
                break;

            case 'reference':
                options.reference = requireValue(name, value);
                break;

            case 'until-serial':
                options.untilSerial = requireValue(name, value);
                break;

            case 'palette': {
                const palette = requireValue(name, value);
                if (!Object.prototype.hasOwnProperty.call(PALETTES, palette)) throw new UsageError(`unknown palette: ${palette}`);

                options.palette = palette;
                break;
            }

            case 'realtime':
                options.realtime = requireFlag(name, value);
                break;

            case 'serial':
                options.serial = requireFlag(name, value);
                break;

            case 'quiet':
                options.quiet = requireFlag(name, value);
                break;

            default:
                throw new UsageError(`unknown option --${name}`);
        }
    }

    if (positional.length !== 1) throw new UsageError(positional.length === 0 ? 'no ROM given' : 'more than one ROM given');
    options.rom = positional[0];

    return options;
}

function requireValue(name: string, value: string | undefined): string {
    if (value === undefined || value === '') throw new UsageError(`--${name} requires a value`);

    return value;
}

function requireFlag(name: string, value: string | undefined): boolean {
    if (value !== undefined) throw new UsageError(`--${name} takes no value`);

    return true;
}
