import { Bus } from '../../src/emulator/bus';
import { Ram } from '../../src/emulator/ram';

describe('Ram', () => {
    function setup(): Bus {
        const bus = new Bus();
        const ram = new Ram();

        ram.install(bus);
        ram.reset();

        return bus;
    }

    it('mirrors work RAM at 0xe000', () => {
        const bus = setup();

        bus.write(0xc123, 0x42);
        expect(bus.read(0xe123)).toBe(0x42);

        bus.write(0xfdff, 0x17);
        expect(bus.read(0xddff)).toBe(0x17);
    });

    it('keeps HRAM separate', () => {
        const bus = setup();

        bus.write(0xff80, 0x01);
        bus.write(0xfffe, 0x02);

        expect([bus.read(0xff80), bus.read(0xfffe), bus.read(0xc000)]).toEqual([0x01, 0x02, 0x00]);
    });

    it('leaves 0xfe00 - 0xff7f unmapped', () => {
        const bus = setup();

        bus.write(0xfea0, 0x42);
        expect(bus.read(0xfea0)).toBe(0xff);
    });
});
