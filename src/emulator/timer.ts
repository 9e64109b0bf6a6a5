import { Bus, ReadHandler, WriteHandler } from './bus';
import { Interrupt, irq } from './interrupt';

import { hex8 } from '../helper/format';

export const enum reg {
    base = 0xff04,
    div = 0x00,
    tima = 0x01,
    tma = 0x02,
    tac = 0x03,
}

// Bit of the internal 16 bit divider (counted in dots) whose falling edge clocks TIMA.
function tapBit(tac: number): number {
    switch (tac & 0x03) {
        case 0x00:
            return 1 << 9;

        case 0x01:
            return 1 << 3;

        case 0x02:
            return 1 << 5;

        default:
            return 1 << 7;
    }
}

export class Timer {
    constructor(private interrupt: Interrupt) {}

    install(bus: Bus): void {
        bus.map(reg.base + reg.div, this.divRead, this.divWrite);
        bus.map(reg.base + reg.tima, this.timaRead, this.timaWrite);
        bus.map(reg.base + reg.tma, this.tmaRead, this.tmaWrite);
        bus.map(reg.base + reg.tac, this.tacRead, this.tacWrite);
    }

    reset(): void {
        this.divider = 0xabcc;
        this.tima = 0;
        this.tma = 0;
        this.tac = 0;
    }

    cycle(cpuClocks: number): void {
        for (let i = 0; i < cpuClocks; i++) this.setDivider((this.divider + 4) & 0xffff);
    }

    printState(): string {
        return `div=${hex8(this.divider >>> 8)} tima=${hex8(this.tima)} tma=${hex8(this.tma)} tac=${hex8(this.tac)}`;
    }

    private setDivider(value: number): void {
        const before = this.timerInput();
        this.divider = value;

        if (before && !this.timerInput()) this.incrementTima();
    }

    private timerInput(): boolean {
        return (this.tac & 0x04) !== 0 && (this.divider & tapBit(this.tac)) !== 0;
    }

    private incrementTima(): void {
        this.tima = (this.tima + 1) & 0xff;
        if (this.tima !== 0) return;

        this.tima = this.tma;
        this.interrupt.raise(irq.timer);
    }

    private divRead: ReadHandler = () => this.divider >>> 8;
    private divWrite: WriteHandler = () => this.setDivider(0);

    private timaRead: ReadHandler = () => this.tima;
    private timaWrite: WriteHandler = (_, value) => (this.tima = value);

    private tmaRead: ReadHandler = () => this.tma;
    private tmaWrite: WriteHandler = (_, value) => (this.tma = value);

    private tacRead: ReadHandler = () => 0xf8 | this.tac;
    private tacWrite: WriteHandler = (_, value) => {
        const before = this.timerInput();
        this.tac = value & 0x07;

        if (before && !this.timerInput()) this.incrementTima();
    };

    private divider = 0xabcc;
    private tima = 0;
    private tma = 0;
    private tac = 0;
}
