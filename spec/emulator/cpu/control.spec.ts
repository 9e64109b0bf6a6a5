import { CpuMode, LockInfo, r16 } from '../../../src/emulator/cpu';

import { irq } from '../../../src/emulator/interrupt';
import { newEnvironment } from '../../support/_helper';

describe('The glorious CPU', () => {
    describe('HALT', () => {
        it('idles for one cycle while no interrupt is pending', () => {
            const { cpu } = newEnvironment([0x76]);

            expect(cpu.step(1)).toBe(1);
            expect(cpu.getMode()).toBe(CpuMode.halted);

            expect(cpu.step(3)).toBe(3);
            expect(cpu.state.p).toBe(0x101);
        });

        it('dispatches the highest priority interrupt if interrupts are enabled', () => {
            const { cpu, bus, interrupt } = newEnvironment([0x76]);

            bus.write(0xffff, irq.vblank | irq.timer);
            bus.write(0xff0f, 0x00);
            cpu.state.interruptsEnabled = true;

            cpu.step(1);

            interrupt.raise(irq.timer);
            interrupt.raise(irq.vblank);

            expect(cpu.step(1)).toBe(5);
            expect(cpu.state.p).toBe(0x40);
            expect(cpu.getMode()).toBe(CpuMode.running);
            expect(cpu.state.interruptsEnabled).toBe(false);
            expect(bus.read16(cpu.state.r16[r16.sp])).toBe(0x101);
            expect(bus.read(0xff0f)).toBe(0xe0 | irq.timer);
        });

        it('wakes up without dispatching if interrupts are disabled', () => {
            const { cpu, bus, interrupt } = newEnvironment([0x76]);

            bus.write(0xffff, irq.timer);
            cpu.step(1);

            interrupt.raise(irq.timer);

            expect(cpu.step(1)).toBe(1);
            expect(cpu.getMode()).toBe(CpuMode.running);
            expect(cpu.state.p).toBe(0x101);
            expect(bus.read(0xff0f) & irq.timer).toBe(irq.timer);
        });

        it('is woken by the timer', () => {
            // LD A, 0x05; LDH (0x07), A; HALT
            const { cpu, bus } = newEnvironment([0x3e, 0x05, 0xe0, 0x07, 0x76]);

            bus.write(0xffff, irq.timer);
            bus.write(0xff05, 0xff);

            cpu.step(3);
            expect(cpu.getMode()).toBe(CpuMode.halted);

            for (let i = 0; i < 10 && cpu.getMode() === CpuMode.halted; i++) cpu.step(1);

            expect(cpu.getMode()).toBe(CpuMode.running);
        });
    });

    describe('EI', () => {
        it('enables interrupts after the following instruction', () => {
            const { cpu, bus } = newEnvironment([0xfb, 0x00, 0x00]);

            bus.write(0xffff, irq.vblank);
            bus.write(0xff0f, irq.vblank);

            expect(cpu.step(1)).toBe(1);
            expect(cpu.state.interruptsEnabled).toBe(false);

            expect(cpu.step(1)).toBe(1);
            expect(cpu.state.p).toBe(0x102);
            expect(cpu.state.interruptsEnabled).toBe(true);

            expect(cpu.step(1)).toBe(5);
            expect(cpu.state.p).toBe(0x40);
            expect(bus.read16(cpu.state.r16[r16.sp])).toBe(0x102);
        });

        it('is cancelled by an immediately following DI', () => {
            const { cpu, bus } = newEnvironment([0xfb, 0xf3, 0x00]);

            bus.write(0xffff, irq.vblank);
            bus.write(0xff0f, irq.vblank);

            cpu.step(3);

            expect(cpu.state.p).toBe(0x103);
            expect(cpu.state.interruptsEnabled).toBe(false);
        });

        it('RETI enables interrupts immediately', () => {
            const { cpu, bus } = newEnvironment([0xd9]);

            cpu.state.r16[r16.sp] = 0xdff0;
            bus.write16(0xdff0, 0x0200);

            expect(cpu.step(1)).toBe(4);
            expect(cpu.state.p).toBe(0x200);
            expect(cpu.state.interruptsEnabled).toBe(true);
        });
    });

    describe('undefined opcodes', () => {
        it('lock the CPU and report the offending opcode', () => {
            const { cpu, log } = newEnvironment([0xd3]);
            const locks: Array<LockInfo> = [];

            cpu.onLock.addHandler((info) => locks.push(info));

            expect(cpu.step(1)).toBe(0);
            expect(cpu.isLocked()).toBe(true);
            expect(locks).toEqual([{ opcode: 0xd3, address: 0x100 }]);
            expect(log).toEqual(['error: CPU locked up: undefined opcode 0xd3 at 0x0100']);
        });

        it('keep the CPU locked', () => {
            const { cpu } = newEnvironment([0xfd]);

            cpu.step(1);

            expect(cpu.step(10)).toBe(0);
            expect(cpu.run()).toBe(0);
            expect(cpu.state.p).toBe(0x100);
        });

        it('ignore pending interrupts once locked', () => {
            const { cpu, bus } = newEnvironment([0xdb]);

            cpu.step(1);

            bus.write(0xffff, irq.vblank);
            cpu.state.interruptsEnabled = true;

            expect(cpu.run()).toBe(0);
            expect(cpu.state.p).toBe(0x100);
        });
    });

    describe('STOP', () => {
        it('idles until woken', () => {
            const { cpu } = newEnvironment([0x10, 0x00, 0x00]);

            expect(cpu.step(1)).toBe(1);
            expect(cpu.getMode()).toBe(CpuMode.stopped);
            expect(cpu.state.p).toBe(0x102);

            expect(cpu.step(2)).toBe(2);
            expect(cpu.state.p).toBe(0x102);

            cpu.wake();
            cpu.step(1);

            expect(cpu.getMode()).toBe(CpuMode.running);
            expect(cpu.state.p).toBe(0x103);
        });

        it('wake has no effect on a halted CPU', () => {
            const { cpu } = newEnvironment([0x76]);

            cpu.step(1);
            cpu.wake();

            expect(cpu.getMode()).toBe(CpuMode.halted);
        });
    });

    describe('program counter', () => {
        it('wraps around at the end of the address space', () => {
            const { cpu, bus } = newEnvironment([]);

            bus.write(0xffff, 0x00);
            cpu.state.p = 0xffff;

            cpu.step(1);

            expect(cpu.state.p).toBe(0x0000);
        });

        it('advances by one per NOP through the wrap', () => {
            const { cpu, bus } = newEnvironment([]);

            // HRAM, IE and the start of the cartridge are all zero
            bus.write(0xffff, 0x00);
            cpu.state.p = 0xff80;

            for (let i = 1; i <= 0x100; i++) {
                expect(cpu.run()).toBe(1);
                expect(cpu.state.p).toBe((0xff80 + i) & 0xffff);
            }

            expect(cpu.state.p).toBe(0x0080);
        });
    });

    describe('events', () => {
        it('reports the address of every executed instruction', () => {
            const { cpu } = newEnvironment([0x00, 0x00, 0xc3, 0x00, 0x02]);
            const executed: Array<number> = [];
            const after: Array<number> = [];

            cpu.onExecute.addHandler((address) => executed.push(address));
            cpu.onAfterExecute.addHandler((address) => after.push(address));

            cpu.step(3);

            expect(executed).toEqual([0x100, 0x101, 0x102]);
            expect(after).toEqual([0x101, 0x102, 0x200]);
        });
    });

    describe('reset', () => {
        it('restores the post-boot register values', () => {
            const { cpu } = newEnvironment([]);

            cpu.state.r16[r16.bc] = 0x1234;
            cpu.reset();

            expect(cpu.printState()).toBe('af=0x01b0 bc=0x0013 de=0x00d8 hl=0x014d s=0xfffe p=0x0100 interrupts=off mode=running');
        });
    });
});
