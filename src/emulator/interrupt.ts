import { Bus, ReadHandler, WriteHandler } from './bus';

import { hex8 } from '../helper/format';

const enum reg {
    if = 0xff0f,
    ie = 0xffff,
}

// Bit order doubles as dispatch priority: lower bits win.
export const enum irq {
    vblank = 0x01,
    stat = 0x02,
    timer = 0x04,
    serial = 0x08,
    joypad = 0x10,
}

export function getIrqVector(interrupt: irq): number {
    switch (interrupt) {
        case irq.vblank:
            return 0x40;

        case irq.stat:
            return 0x48;

        case irq.timer:
            return 0x50;

        case irq.serial:
            return 0x58;

        case irq.joypad:
            return 0x60;
    }
}

export class Interrupt {
    install(bus: Bus): void {
        bus.map(reg.if, this.readIF, this.writeIF);
        bus.map(reg.ie, this.readIE, this.writeIE);
    }

    reset(): void {
        this.ie = 0;
        this.if = irq.vblank;
    }

    raise(interrupt: irq): void {
        this.if |= interrupt;
    }

    clear(interrupt: irq): void {
        this.if &= ~interrupt;
    }

    isPending(): boolean {
        return (this.if & this.ie & 0x1f) !== 0;
    }

    // Highest priority interrupt that is both requested and enabled, 0 if none.
    getNext(): irq | 0 {
        const flags = this.if & this.ie & 0x1f;

        if (flags & irq.vblank) return irq.vblank;
        if (flags & irq.stat) return irq.stat;
        if (flags & irq.timer) return irq.timer;
        if (flags & irq.serial) return irq.serial;
        if (flags & irq.joypad) return irq.joypad;

        return 0;
    }

    printState(): string {
        return `ie=${hex8(this.ie)} if=${hex8(this.if)}`;
    }

    private ie = 0;
    private if = irq.vblank;

    private readIE: ReadHandler = () => this.ie;
    private writeIE: WriteHandler = (_, value) => (this.ie = value);

    private readIF: ReadHandler = () => 0xe0 | this.if;
    private writeIF: WriteHandler = (_, value) => (this.if = value & 0x1f);
}
