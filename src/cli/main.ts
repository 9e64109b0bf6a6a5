import { CliOptions, USAGE, UsageError, parseOptions } from './options';
import { compareFrames, decodeFrame, encodeFrame } from './image';

import { Emulator } from '../emulator/emulator';
import { LogLevel } from '../emulator/system';
import { PALETTES } from '../emulator/palette';
import { StopReason } from '../emulator/scheduler';
import md5 from 'md5';

export const enum ExitCode {
    ok = 0,
    failure = 1,
    usage = 2,
}

export interface CliIo {
    print(message: string): void;
    write(text: string): void;
    readFile(path: string): Uint8Array;
    writeFile(path: string, data: Uint8Array): void;
}

export async function runCli(argv: ReadonlyArray<string>, io: CliIo, signal?: AbortSignal): Promise<ExitCode> {
    let options: CliOptions;

    try {
        options = parseOptions(argv);
    } catch (e) {
        if (!(e instanceof UsageError)) throw e;

        io.print(`error: ${e.message}`);
        io.print(USAGE);

        return ExitCode.usage;
    }

    let emulator: Emulator;

    try {
        const image = io.readFile(options.rom);

        emulator = new Emulator(image, (message) => io.print(message), {
            logLevel: options.quiet ? LogLevel.error : LogLevel.info,
            palette: PALETTES[options.palette],
        });

        if (!options.quiet) {
            io.print(`loaded ${options.rom} (md5 ${md5(Buffer.from(image))})`);
            io.print(emulator.printCartridgeInfo());
        }
    } catch (e) {
        io.print(`error: failed to start: ${e instanceof Error ? e.message : String(e)}`);

        return ExitCode.usage;
    }

    if (options.serial) emulator.onSerialData.addHandler((byte) => io.write(String.fromCharCode(byte)));

    const untilSerial = options.untilSerial;
    const serialDone = () => untilSerial !== undefined && emulator.getSerialOutput().includes(untilSerial);

    if (options.realtime) {
        emulator.setSpeed(options.speed);
        if (untilSerial !== undefined) emulator.onSerialData.addHandler(() => serialDone() && emulator.stop());

        const reason = await emulator.start({ signal, maxFrames: options.frames });
        if (reason === StopReason.trap) io.print(`stopped on trap: ${emulator.lastTrapMessage()}`);
    } else {
        for (let frame = 0; frame < options.frames && !serialDone() && !signal?.aborted; frame++) {
            if (!emulator.runFrame()) break;
        }
    }

    if (options.serial) io.write('\n');

    let exitCode = ExitCode.ok;

    if (emulator.isLocked()) {
        io.print('error: CPU locked up');
        io.print(emulator.printState());

        exitCode = ExitCode.failure;
    }

    if (untilSerial !== undefined && !serialDone()) {
        io.print(`error: serial output never contained "${untilSerial}"`);
        exitCode = ExitCode.failure;
    }

    const frame = emulator.getFrameData();

    if (options.screenshot !== undefined) {
        io.writeFile(options.screenshot, encodeFrame(frame));
        if (!options.quiet) io.print(`screenshot written to ${options.screenshot}`);
    }

    if (options.reference !== undefined) {
        try {
            const mismatches = compareFrames(frame, decodeFrame(io.readFile(options.reference)));

            if (mismatches > 0) {
                io.print(`error: frame differs from ${options.reference} in ${mismatches} pixels`);
                exitCode = ExitCode.failure;
            } else if (!options.quiet) {
                io.print(`frame matches ${options.reference}`);
            }
        } catch (e) {
            io.print(`error: unable to compare against ${options.reference}: ${e instanceof Error ? e.message : String(e)}`);
            exitCode = ExitCode.failure;
        }
    }

    return exitCode;
}
