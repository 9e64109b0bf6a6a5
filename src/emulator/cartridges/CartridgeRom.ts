import { Bus, OPEN_BUS, ReadHandler, WriteHandler } from '../bus';

import { CartridgeBase } from './CartridgeBase';

// 32kb without a mapper, optionally with up to 8kb of RAM.
export class CartridgeRom extends CartridgeBase {
    install(bus: Bus): void {
        bus.mapRange(0x0000, 0x7fff, this.romRead, this.stubWrite);
        bus.mapRange(0xa000, 0xbfff, this.ramRead, this.ramWrite);
    }

    printState(): string {
        return `rom ${this.ram.length === 0 ? 'only' : `with ${this.ram.length / 1024}kb ram`}`;
    }

    private romRead: ReadHandler = (address) => this.image[address];

    private ramRead: ReadHandler = (address) => (address - 0xa000 < this.ram.length ? this.ram[address - 0xa000] : OPEN_BUS);
    private ramWrite: WriteHandler = (address, value) => {
        if (address - 0xa000 < this.ram.length) this.ram[address - 0xa000] = value;
    };
}
