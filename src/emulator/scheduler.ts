import { CYCLES_PER_FRAME, Ppu } from './ppu';
import { Cpu, CpuMode } from './cpu';

import { Average } from './average';
import { Event } from 'microevent.ts';
import { System } from './system';
import { performance } from 'node:perf_hooks';
import { setTimeout as sleep } from 'node:timers/promises';

export const DOT_CLOCK = 4194304;
export const DOTS_PER_CPU_CYCLE = 4;
export const FRAME_INTERVAL_SEC = CYCLES_PER_FRAME / DOT_CLOCK;

const HOST_SPEED_AVERAGE_SAMPLES = 60;

export const enum engine {
    cpu = 'cpu',
    ppu = 'ppu',
}

export const enum StopReason {
    stop = 'stop',
    lock = 'lock',
    trap = 'trap',
    frameLimit = 'frame limit',
}

export interface Statistics {
    frames: number;
    hostSpeed: number;
    speed: number;
}

export interface RunOptions {
    signal?: AbortSignal;
    maxFrames?: number;
}

/**
 * Interleaves CPU and PPU by debt: every engine accumulates the dots it has spent, and the engine that is further
 * behind runs next. A tie goes to the CPU.
 */
export class Scheduler {
    constructor(private cpu: Cpu, private ppu: Ppu, private system: System) {}

    reset(): void {
        this.cpuDebt = 0;
        this.ppuDebt = 0;
        this.frames = 0;
        this.lockReported = false;
    }

    tick(): engine {
        let ran: engine;

        if (this.cpuDebt <= this.ppuDebt) {
            this.cpuDebt += this.cpu.run() * DOTS_PER_CPU_CYCLE;
            ran = engine.cpu;
        } else {
            this.ppuDebt += this.ppu.run(this.cpuDebt - this.ppuDebt);
            ran = engine.ppu;
        }

        if (this.ppu.frameReady()) {
            this.frames++;
            this.onFrame.dispatch(this.ppu.getFrame());
        }

        return ran;
    }

    /**
     * Run until the next frame is delivered. Returns false if the CPU locked up or a trap fired before that.
     */
    runFrame(): boolean {
        const frames = this.frames;

        while (this.frames === frames) {
            if (this.system.isTrap) return false;
            if (this.checkLock()) return false;

            this.tick();
        }

        return true;
    }

    /**
     * Run frames paced to real time until stopped, aborted, locked or trapped. When the host falls behind the
     * schedule is reset instead of skipping emulated work.
     */
    async start({ signal, maxFrames }: RunOptions = {}): Promise<StopReason> {
        if (this.abortController !== undefined) throw new Error('scheduler already running');

        const abortController = new AbortController();
        this.abortController = abortController;

        const onExternalAbort = () => abortController.abort();
        signal?.addEventListener('abort', onExternalAbort);
        if (signal?.aborted) abortController.abort();

        this.hostSpeedAverage.reset();

        this.onStart.dispatch();

        let reason = StopReason.stop;

        try {
            let deadline = performance.now();
            let framesRun = 0;

            while (!abortController.signal.aborted) {
                if (maxFrames !== undefined && framesRun >= maxFrames) {
                    reason = StopReason.frameLimit;
                    break;
                }

                const timestampBeforeFrame = performance.now();

                if (!this.runFrame()) {
                    reason = this.cpu.getMode() === CpuMode.locked ? StopReason.lock : StopReason.trap;
                    break;
                }

                framesRun++;

                const timestampAfterFrame = performance.now();
                if (timestampAfterFrame > timestampBeforeFrame) {
                    this.hostSpeedAverage.push((FRAME_INTERVAL_SEC * 1000) / (timestampAfterFrame - timestampBeforeFrame));
                }

                deadline += (FRAME_INTERVAL_SEC * 1000) / this.speed;
                if (deadline < timestampAfterFrame) deadline = timestampAfterFrame;

                if (!(await this.waitUntil(deadline, abortController.signal))) break;
            }
        } finally {
            signal?.removeEventListener('abort', onExternalAbort);

            this.abortController = undefined;
        }

        this.onStop.dispatch(reason);

        return reason;
    }

    stop(): void {
        this.abortController?.abort();
    }

    isRunning(): boolean {
        return this.abortController !== undefined;
    }

    setSpeed(speed: number): void {
        if (speed <= 0 || !Number.isFinite(speed)) return;
        this.speed = speed;
    }

    getSpeed(): number {
        return this.speed;
    }

    getFrameCount(): number {
        return this.frames;
    }

    getDebt(): { cpu: number; ppu: number } {
        return { cpu: this.cpuDebt, ppu: this.ppuDebt };
    }

    getStatistics(): Statistics {
        return { frames: this.frames, hostSpeed: this.hostSpeedAverage.calculateAverage(), speed: this.speed };
    }

    private checkLock(): boolean {
        if (!this.cpu.isLocked()) return false;

        if (!this.lockReported) {
            this.system.error('CPU locked, scheduler stopped');
            this.lockReported = true;
        }

        return true;
    }

    private async waitUntil(deadline: number, signal: AbortSignal): Promise<boolean> {
        const delay = deadline - performance.now();
        if (delay <= 0) return !signal.aborted;

        try {
            await sleep(delay, undefined, { signal });
        } catch (e) {
            if (signal.aborted) return false;

            throw e;
        }

        return true;
    }

    readonly onFrame = new Event<Uint32Array>();
    readonly onStart = new Event<void>();
    readonly onStop = new Event<StopReason>();

    private cpuDebt = 0;
    private ppuDebt = 0;
    private frames = 0;
    private speed = 1;
    private lockReported = false;

    private abortController: AbortController | undefined = undefined;

    private hostSpeedAverage = new Average(HOST_SPEED_AVERAGE_SAMPLES);
}
