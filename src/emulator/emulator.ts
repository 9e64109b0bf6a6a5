import { Cartridge, createCartridge } from './cartridge';
import { InputBridge, InputSource, ManualInput } from './input';
import { Joypad, key } from './joypad';
import { LogLevel, PrintCallback, System } from './system';
import { PALETTE_CLASSIC, Palette } from './palette';
import { RunOptions, Scheduler, StopReason } from './scheduler';
import { decodeInstruction, disassembleInstruction } from './instruction';

import { Bus } from './bus';
import { Clock } from './clock';
import { Cpu } from './cpu';
import { Event } from 'microevent.ts';
import { Interrupt } from './interrupt';
import { Ppu } from './ppu';
import { Ram } from './ram';
import { Serial } from './serial';
import { Timer } from './timer';
import { Trace } from './trace';
import { hex16 } from '../helper/format';

export interface BusTrap {
    address: number;
    trapRead: boolean;
    trapWrite: boolean;
}

export interface EmulatorOptions {
    logLevel?: LogLevel;
    palette?: Palette;
}

export class Emulator {
    constructor(cartridgeImage: Uint8Array, printCb: PrintCallback, { logLevel = LogLevel.info, palette = PALETTE_CLASSIC }: EmulatorOptions = {}) {
        this.system = new System(printCb, logLevel);
        this.bus = new Bus();
        this.interrupt = new Interrupt();
        this.ppu = new Ppu(this.bus, this.interrupt);
        this.timer = new Timer(this.interrupt);
        this.serial = new Serial(this.interrupt);
        this.clock = new Clock(this.timer, this.serial);
        this.cpu = new Cpu(this.bus, this.clock, this.interrupt, this.system);
        this.ram = new Ram();
        this.joypad = new Joypad(this.interrupt);
        this.input = new InputBridge(this.joypad);
        this.scheduler = new Scheduler(this.cpu, this.ppu, this.system);

        this.cartridge = createCartridge(cartridgeImage, this.system);

        this.cartridge.install(this.bus);
        this.ram.install(this.bus);
        this.interrupt.install(this.bus);
        this.serial.install(this.bus);
        this.ppu.install(this.bus);
        this.timer.install(this.bus);
        this.joypad.install(this.bus);

        this.ppu.setPalette(palette);
        this.input.addSource(this.manualInput);

        this.cpu.onExecute.addHandler((address) => this.trace.add(address));
        this.bus.onRead.addHandler(this.onBusRead);
        this.bus.onWrite.addHandler(this.onBusWrite);
        this.joypad.onPress.addHandler(() => this.cpu.wake());
        this.serial.onTransfer.addHandler((byte) => {
            this.serialOutput += String.fromCharCode(byte);
            this.onSerialData.dispatch(byte);
        });
        this.scheduler.onFrame.addHandler(() => this.input.poll());

        this.onTrap = this.system.onTrap;
        this.onFrame = this.scheduler.onFrame;

        this.reset();
    }

    reset(): void {
        this.cartridge.reset();
        this.cpu.reset();
        this.ram.reset();
        this.ppu.reset();
        this.timer.reset();
        this.joypad.reset();
        this.interrupt.reset();
        this.serial.reset();
        this.trace.reset();
        this.scheduler.reset();
        this.system.clearTrap();

        this.serialOutput = '';
    }

    runFrame(): boolean {
        this.system.clearTrap();
        return this.scheduler.runFrame();
    }

    start(options?: RunOptions): Promise<StopReason> {
        this.system.clearTrap();
        return this.scheduler.start(options);
    }

    stop(): void {
        this.scheduler.stop();
    }

    isRunning(): boolean {
        return this.scheduler.isRunning();
    }

    setSpeed(speed: number): void {
        this.scheduler.setSpeed(speed);
    }

    step(count: number): number {
        this.system.clearTrap();
        return this.cpu.step(count);
    }

    isLocked(): boolean {
        return this.cpu.isLocked();
    }

    isTrap(): boolean {
        return this.system.isTrap;
    }

    lastTrapMessage(): string {
        return this.system.getTrapMessage();
    }

    addBreakpoint(address: number): void {
        this.breakpoints.add(address);

        if (!this.cpu.onAfterExecute.isHandlerAttached(this.onAfterExecuteHandler)) {
            this.cpu.onAfterExecute.addHandler(this.onAfterExecuteHandler);
        }
    }

    clearBreakpoint(address: number): void {
        this.breakpoints.delete(address);

        if (this.breakpoints.size === 0) this.cpu.onAfterExecute.removeHandler(this.onAfterExecuteHandler);
    }

    clearBreakpoints(): void {
        this.breakpoints.clear();
        this.cpu.onAfterExecute.removeHandler(this.onAfterExecuteHandler);
    }

    getBreakpoints(): Array<number> {
        return Array.from(this.breakpoints).sort((a, b) => a - b);
    }

    addTrapWrite(address: number): void {
        this.busTraps.set(address, { ...(this.busTraps.get(address) || { address, trapRead: false, trapWrite: false }), trapWrite: true });
    }

    addTrapRead(address: number): void {
        this.busTraps.set(address, { ...(this.busTraps.get(address) || { address, trapRead: false, trapWrite: false }), trapRead: true });
    }

    clearRWTrap(address: number): void {
        this.busTraps.delete(address);
    }

    clearRWTraps(): void {
        this.busTraps.clear();
    }

    getTraps(): Array<BusTrap> {
        return Array.from(this.busTraps.values()).sort((t1, t2) => t1.address - t2.address);
    }

    getTrace(count?: number): string {
        return this.inspect(() =>
            this.trace
                .entries(count)
                .map((address, index) => `${index + 1}. ${this.disassemblyLineAt(address)}`)
                .join('\n')
        );
    }

    disassemble(count: number, address = this.cpu.state.p): Array<string> {
        return this.inspect(() => {
            const lines: Array<string> = [];

            for (let i = 0; i < count; i++) {
                lines.push(this.disassemblyLineAt(address));

                address = (address + decodeInstruction(this.bus, address).len) & 0xffff;
            }

            return lines;
        });
    }

    printCartridgeInfo(): string {
        return `Cartridge: ${this.cartridge.printInfo()}`;
    }

    printState(): string {
        return `CPU:\n${this.cpu.printState()}\n\nIRQ:\n${this.interrupt.printState()}\n\nTimer:\n${this.timer.printState()}\n\nPPU:\n${this.ppu.printState()}\n\nCartridge:\n${this.cartridge.printState()}`;
    }

    keyDown(k: key): void {
        this.manualInput.press(k);
        this.input.poll();
    }

    keyUp(k: key): void {
        this.manualInput.release(k);
        this.input.poll();
    }

    addInputSource(source: InputSource): void {
        this.input.addSource(source);
    }

    removeInputSource(source: InputSource): void {
        this.input.removeSource(source);
    }

    getSerialOutput(): string {
        return this.serialOutput;
    }

    getFrameIndex(): number {
        return this.ppu.getFrameIndex();
    }

    getFrameData(): Uint32Array {
        return this.ppu.getFrame();
    }

    getFrameCount(): number {
        return this.scheduler.getFrameCount();
    }

    getCpu(): Cpu {
        return this.cpu;
    }

    getBus(): Bus {
        return this.bus;
    }

    getScheduler(): Scheduler {
        return this.scheduler;
    }

    getSystem(): System {
        return this.system;
    }

    // Run a debugger query without firing bus traps.
    private inspect<T>(query: () => T): T {
        this.inspecting = true;

        try {
            return query();
        } finally {
            this.inspecting = false;
        }
    }

    private disassemblyLineAt(address: number): string {
        return `${this.breakpoints.has(address) ? ' *' : '  '} ${hex16(address)}: ${disassembleInstruction(this.bus, address)}`;
    }

    private onAfterExecuteHandler = (p: number): void => {
        if (this.breakpoints.has(p)) this.system.trap(`hit breakpoint at ${hex16(p)}`);
    };

    private onBusRead = (address: number): void => {
        if (!this.inspecting && this.busTraps.get(address)?.trapRead) this.system.trap(`trap read from ${hex16(address)}`);
    };

    private onBusWrite = (address: number): void => {
        if (!this.inspecting && this.busTraps.get(address)?.trapWrite) this.system.trap(`trap write to ${hex16(address)}`);
    };

    readonly onTrap: Event<string>;
    readonly onFrame: Event<Uint32Array>;
    readonly onSerialData = new Event<number>();

    private readonly system: System;

    private readonly bus: Bus;
    private readonly cartridge: Cartridge;
    private readonly cpu: Cpu;
    private readonly clock: Clock;
    private readonly ram: Ram;
    private readonly interrupt: Interrupt;
    private readonly serial: Serial;
    private readonly ppu: Ppu;
    private readonly timer: Timer;
    private readonly joypad: Joypad;
    private readonly input: InputBridge;
    private readonly manualInput = new ManualInput();
    private readonly scheduler: Scheduler;

    private readonly trace = new Trace();

    private breakpoints = new Set<number>();
    private busTraps = new Map<number, BusTrap>();

    private serialOutput = '';
    private inspecting = false;
}
