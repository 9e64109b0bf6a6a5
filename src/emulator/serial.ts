import { Bus, ReadHandler, WriteHandler } from './bus';
import { Interrupt, irq } from './interrupt';

import { Event } from 'microevent.ts';

const enum reg {
    base = 0xff01,
    sb = 0x00,
    sc = 0x01,
}

// M-cycles per shifted bit on the internal clock.
const CYCLES_PER_BIT = 128;

// No link partner: transfers on the internal clock shift in 0xff, the external clock never ticks.
export class Serial {
    constructor(private interrupt: Interrupt) {}

    install(bus: Bus): void {
        bus.map(reg.base + reg.sb, this.sbRead, this.sbWrite);
        bus.map(reg.base + reg.sc, this.scRead, this.scWrite);
    }

    reset(): void {
        this.reg[reg.sb] = 0x00;
        this.reg[reg.sc] = 0x7e;

        this.transferInProgress = false;
        this.transferClock = 0;
        this.nextBit = 0;
    }

    cycle(cpuClocks: number): void {
        if (!this.transferInProgress) return;

        this.transferClock += cpuClocks;

        let bits = (this.transferClock / CYCLES_PER_BIT) | 0;
        this.transferClock %= CYCLES_PER_BIT;

        while (bits > 0 && this.nextBit < 8) {
            this.reg[reg.sb] = (this.reg[reg.sb] << 1) | 0x01;

            bits--;
            this.nextBit++;
        }

        if (this.nextBit > 7) {
            this.interrupt.raise(irq.serial);
            this.transferInProgress = false;
            this.reg[reg.sc] &= 0x7f;
        }
    }

    isTransferInProgress(): boolean {
        return this.transferInProgress;
    }

    private sbRead: ReadHandler = () => this.reg[reg.sb];
    private sbWrite: WriteHandler = (_, value) => {
        if (!this.transferInProgress) this.reg[reg.sb] = value;
    };

    private scRead: ReadHandler = () => this.reg[reg.sc];
    private scWrite: WriteHandler = (_, value) => {
        if (this.transferInProgress) return;
        this.reg[reg.sc] = value | 0x7e;

        if ((this.reg[reg.sc] & 0x81) === 0x81) {
            this.transferInProgress = true;
            this.transferClock = 0;
            this.nextBit = 0;

            this.onTransfer.dispatch(this.reg[reg.sb]);
        }
    };

    readonly onTransfer = new Event<number>();

    private reg = new Uint8Array(2);

    private transferInProgress = false;
    private nextBit = 0;
    private transferClock = 0;
}
