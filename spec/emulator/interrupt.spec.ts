import { Interrupt, getIrqVector, irq } from '../../src/emulator/interrupt';

import { Bus } from '../../src/emulator/bus';

describe('Interrupt', () => {
    function setup(): { bus: Bus; interrupt: Interrupt } {
        const bus = new Bus();
        const interrupt = new Interrupt();

        interrupt.install(bus);
        interrupt.reset();

        return { bus, interrupt };
    }

    it('requests vblank after boot', () => {
        const { bus } = setup();

        expect(bus.read(0xff0f)).toBe(0xe1);
        expect(bus.read(0xffff)).toBe(0x00);
    });

    it('only reports interrupts that are requested and enabled', () => {
        const { bus, interrupt } = setup();

        interrupt.raise(irq.timer);
        expect(interrupt.isPending()).toBe(false);

        bus.write(0xffff, irq.timer);
        expect(interrupt.isPending()).toBe(true);
        expect(interrupt.getNext()).toBe(irq.timer);
    });

    it('prioritizes lower bits', () => {
        const { bus, interrupt } = setup();

        bus.write(0xffff, 0x1f);
        bus.write(0xff0f, irq.joypad | irq.serial | irq.stat);

        expect(interrupt.getNext()).toBe(irq.stat);

        interrupt.clear(irq.stat);
        expect(interrupt.getNext()).toBe(irq.serial);

        interrupt.clear(irq.serial);
        expect(interrupt.getNext()).toBe(irq.joypad);

        interrupt.clear(irq.joypad);
        expect(interrupt.getNext()).toBe(0);
    });

    it('keeps the upper bits of IF set', () => {
        const { bus } = setup();

        bus.write(0xff0f, 0xff);

        expect(bus.read(0xff0f)).toBe(0xff);

        bus.write(0xff0f, 0x00);

        expect(bus.read(0xff0f)).toBe(0xe0);
    });

    it('maps interrupts to their vectors', () => {
        expect([irq.vblank, irq.stat, irq.timer, irq.serial, irq.joypad].map(getIrqVector)).toEqual([0x40, 0x48, 0x50, 0x58, 0x60]);
    });
});
