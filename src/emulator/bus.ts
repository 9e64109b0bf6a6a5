import { Event } from 'microevent.ts';

export type ReadHandler = (address: number) => number;
export type WriteHandler = (address: number, value: number) => void;

// Value seen on reads that no device answers.
export const OPEN_BUS = 0xff;

export class Bus {
    constructor() {
        this.clear();
    }

    read(address: number): number {
        this.onRead.dispatch(address);

        return this.readMap[address](address);
    }

    write(address: number, value: number): void {
        this.onWrite.dispatch(address);

        this.writeMap[address](address, value & 0xff);
    }

    read16(address: number): number {
        return this.read(address) | (this.read((address + 1) & 0xffff) << 8);
    }

    write16(address: number, value: number): void {
        this.write(address, value & 0xff);
        this.write((address + 1) & 0xffff, value >>> 8);
    }

    map(address: number, read: ReadHandler, write: WriteHandler): void {
        this.readMap[address] = read;
        this.writeMap[address] = write;
    }

    mapRange(from: number, to: number, read: ReadHandler, write: WriteHandler): void {
        for (let address = from; address <= to; address++) this.map(address, read, write);
    }

    unmap(address: number): void {
        this.map(address, this.openBusRead, this.openBusWrite);
    }

    clear(): void {
        for (let i = 0; i < 0x10000; i++) this.unmap(i);
    }

    private openBusRead: ReadHandler = () => OPEN_BUS;
    private openBusWrite: WriteHandler = () => undefined;

    readonly onRead = new Event<number>();
    readonly onWrite = new Event<number>();

    private readonly readMap = new Array<ReadHandler>(0x10000);
    private readonly writeMap = new Array<WriteHandler>(0x10000);
}
