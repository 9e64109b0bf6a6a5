import { Bus, ReadHandler, WriteHandler } from './bus';

export class Ram {
    install(bus: Bus): void {
        // 0xe000 - 0xfdff mirrors work RAM
        bus.mapRange(0xc000, 0xfdff, this.wramRead, this.wramWrite);
        bus.mapRange(0xff80, 0xfffe, this.hiramRead, this.hiramWrite);
    }

    reset(): void {
        this.wram.fill(0);
        this.hiram.fill(0);
    }

    private wramRead: ReadHandler = (address) => this.wram[address & 0x1fff];
    private wramWrite: WriteHandler = (address, value) => (this.wram[address & 0x1fff] = value);

    private hiramRead: ReadHandler = (address) => this.hiram[address - 0xff80];
    private hiramWrite: WriteHandler = (address, value) => (this.hiram[address - 0xff80] = value);

    private wram = new Uint8Array(0x2000);
    private hiram = new Uint8Array(0x7f);
}
