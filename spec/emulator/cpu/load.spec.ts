import { r16, r8 } from '../../../src/emulator/cpu';

import { newEnvironment } from '../../support/_helper';

describe('The glorious CPU', () => {
    describe('LD (HL+), A / LD A, (HL-)', () => {
        it('stores and increments HL', () => {
            const { cpu, bus } = newEnvironment([0x22]);

            cpu.state.r8[r8.a] = 0x42;
            cpu.state.r16[r16.hl] = 0xc000;

            cpu.step(1);

            expect(bus.read(0xc000)).toBe(0x42);
            expect(cpu.state.r16[r16.hl]).toBe(0xc001);
        });

        it('loads and decrements HL', () => {
            const { cpu, bus } = newEnvironment([0x3a]);

            cpu.state.r16[r16.hl] = 0xc000;
            bus.write(0xc000, 0x17);

            cpu.step(1);

            expect(cpu.state.r8[r8.a]).toBe(0x17);
            expect(cpu.state.r16[r16.hl]).toBe(0xbfff);
        });
    });

    describe('high page loads', () => {
        it('LDH (a8), A writes to 0xff00 + a8', () => {
            const { cpu, bus } = newEnvironment([0xe0, 0x90]);

            cpu.state.r8[r8.a] = 0x33;
            cpu.step(1);

            expect(bus.read(0xff90)).toBe(0x33);
        });

        it('LD A, (C) reads from 0xff00 + C', () => {
            const { cpu, bus } = newEnvironment([0xf2]);

            bus.write(0xff85, 0x99);
            cpu.state.r8[r8.c] = 0x85;
            cpu.step(1);

            expect(cpu.state.r8[r8.a]).toBe(0x99);
        });
    });

    describe('LD (a16), SP', () => {
        it('stores SP little endian', () => {
            const { cpu, bus } = newEnvironment([0x08, 0x00, 0xc1]);

            cpu.state.r16[r16.sp] = 0xbeef;
            cpu.step(1);

            expect(bus.read(0xc100)).toBe(0xef);
            expect(bus.read(0xc101)).toBe(0xbe);
        });
    });

    describe('stack', () => {
        it('PUSH BC and POP DE round trip through memory', () => {
            const { cpu, bus } = newEnvironment([0xc5, 0xd1]);

            cpu.state.r16[r16.sp] = 0xdff0;
            cpu.state.r16[r16.bc] = 0x1234;

            cpu.step(1);

            expect(cpu.state.r16[r16.sp]).toBe(0xdfee);
            expect(bus.read(0xdfef)).toBe(0x12);
            expect(bus.read(0xdfee)).toBe(0x34);

            cpu.step(1);

            expect(cpu.state.r16[r16.de]).toBe(0x1234);
            expect(cpu.state.r16[r16.sp]).toBe(0xdff0);
        });

        it('POP AF clears the low nibble of F', () => {
            const { cpu, bus } = newEnvironment([0xf1]);

            cpu.state.r16[r16.sp] = 0xdff0;
            bus.write16(0xdff0, 0x12ff);

            cpu.step(1);

            expect(cpu.state.r8[r8.a]).toBe(0x12);
            expect(cpu.state.r8[r8.f]).toBe(0xf0);
        });
    });

    describe('control flow', () => {
        it('CALL and RET', () => {
            const { cpu, bus, cartridge } = newEnvironment([0xcd, 0x00, 0x02]);

            cartridge[0x200] = 0xc9;

            expect(cpu.step(1)).toBe(6);
            expect(cpu.state.p).toBe(0x200);
            expect(cpu.state.r16[r16.sp]).toBe(0xfffc);
            expect(bus.read16(0xfffc)).toBe(0x103);

            expect(cpu.step(1)).toBe(4);
            expect(cpu.state.p).toBe(0x103);
            expect(cpu.state.r16[r16.sp]).toBe(0xfffe);
        });

        it('JR jumps relative to the next instruction', () => {
            const { cpu } = newEnvironment([0x18, 0xfe]);

            expect(cpu.step(1)).toBe(3);
            expect(cpu.state.p).toBe(0x100);
        });

        it('RST pushes the return address', () => {
            const { cpu, bus } = newEnvironment([0xef]);

            cpu.step(1);

            expect(cpu.state.p).toBe(0x28);
            expect(bus.read16(cpu.state.r16[r16.sp])).toBe(0x101);
        });
    });
});
