import { Bus, OPEN_BUS } from '../../src/emulator/bus';

describe('Bus', () => {
    it('reads 0xff from unmapped addresses and ignores writes', () => {
        const bus = new Bus();

        bus.write(0xfea0, 0x12);

        expect(bus.read(0xfea0)).toBe(OPEN_BUS);
        expect(bus.read(0x0000)).toBe(0xff);
    });

    it('dispatches to mapped handlers and masks written values', () => {
        const bus = new Bus();
        const memory = new Uint8Array(0x10);

        bus.mapRange(
            0xc000,
            0xc00f,
            (address) => memory[address - 0xc000],
            (address, value) => (memory[address - 0xc000] = value)
        );

        bus.write(0xc003, 0x1ab);

        expect(memory[3]).toBe(0xab);
        expect(bus.read(0xc003)).toBe(0xab);
        expect(bus.read(0xc010)).toBe(OPEN_BUS);
    });

    it('reads and writes 16 bit values little endian', () => {
        const bus = new Bus();
        const memory = new Uint8Array(0x10000);

        bus.mapRange(
            0x0000,
            0xffff,
            (address) => memory[address],
            (address, value) => (memory[address] = value)
        );

        bus.write16(0xffff, 0xbeef);

        expect(memory[0xffff]).toBe(0xef);
        expect(memory[0x0000]).toBe(0xbe);
        expect(bus.read16(0xffff)).toBe(0xbeef);
    });

    it('notifies observers of every access', () => {
        const bus = new Bus();
        const reads: Array<number> = [];
        const writes: Array<number> = [];

        bus.onRead.addHandler((address) => reads.push(address));
        bus.onWrite.addHandler((address) => writes.push(address));

        bus.read(0x1234);
        bus.write16(0xc000, 0);

        expect(reads).toEqual([0x1234]);
        expect(writes).toEqual([0xc000, 0xc001]);
    });

    it('unmap restores open bus behavior', () => {
        const bus = new Bus();

        bus.map(0x8000, () => 0x42, () => undefined);
        expect(bus.read(0x8000)).toBe(0x42);

        bus.unmap(0x8000);
        expect(bus.read(0x8000)).toBe(OPEN_BUS);
    });
});
