import { Bus, ReadHandler, WriteHandler } from './bus';
import { Interrupt, irq } from './interrupt';

import { Event } from 'microevent.ts';

export const enum key {
    a,
    b,
    start,
    select,
    up,
    down,
    left,
    right,
}

export const ALL_KEYS: ReadonlyArray<key> = [key.a, key.b, key.start, key.select, key.up, key.down, key.left, key.right];

const enum select {
    directions = 0x10,
    buttons = 0x20,
}

export class Joypad {
    constructor(private interrupt: Interrupt) {}

    install(bus: Bus): void {
        bus.map(0xff00, this.joypadRead, this.joypadWrite);
    }

    reset(): void {
        this.select = 0x30;
        this.keys.fill(0);
    }

    down(k: key): void {
        if (this.keys[k]) return;

        this.updateLines(() => (this.keys[k] = 1));
        this.onPress.dispatch(k);
    }

    up(k: key): void {
        this.keys[k] = 0;
    }

    isDown(k: key): boolean {
        return this.keys[k] === 1;
    }

    // Lines are active low, a high to low transition on any selected line requests the interrupt.
    private updateLines(mutate: () => void): void {
        const before = this.joypadRead(0xff00) & 0x0f;
        mutate();
        const after = this.joypadRead(0xff00) & 0x0f;

        if (before & ~after) this.interrupt.raise(irq.joypad);
    }

    private joypadRead: ReadHandler = () => {
        let result = 0xc0 | this.select | 0x0f;

        if ((this.select & select.buttons) === 0) {
            if (this.keys[key.start]) result &= ~0x08;
            if (this.keys[key.select]) result &= ~0x04;
            if (this.keys[key.b]) result &= ~0x02;
            if (this.keys[key.a]) result &= ~0x01;
        }

        if ((this.select & select.directions) === 0) {
            if (this.keys[key.down]) result &= ~0x08;
            if (this.keys[key.up]) result &= ~0x04;
            if (this.keys[key.left]) result &= ~0x02;
            if (this.keys[key.right]) result &= ~0x01;
        }

        return result;
    };

    private joypadWrite: WriteHandler = (_, value) => this.updateLines(() => (this.select = value & 0x30));

    readonly onPress = new Event<key>();

    private select = 0x30;
    private keys = new Uint8Array(8);
}
