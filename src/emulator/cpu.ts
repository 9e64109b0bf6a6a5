import { AddressingMode, Condition, Instruction, Operation, decodeInstruction } from './instruction';
import { Interrupt, getIrqVector } from './interrupt';
import { hex16, hex8, signed8 } from '../helper/format';

import { Bus } from './bus';
import { Clock } from './clock';
import { Event } from 'microevent.ts';
import { System } from './system';

export const enum r8 {
    f = 0,
    a = 1,
    c = 2,
    b = 3,
    e = 4,
    d = 5,
    l = 6,
    h = 7,
}

export const enum r16 {
    af = 0,
    bc = 1,
    de = 2,
    hl = 3,
    sp = 4,
}

export const enum flag {
    z = 0x80,
    n = 0x40,
    h = 0x20,
    c = 0x10,
}

export const enum CpuMode {
    running,
    halted,
    stopped,
    locked,
}

export interface CpuState {
    r8: Uint8Array;
    r16: Uint16Array;
    p: number;
    interruptsEnabled: boolean;
    // EI was executed, IME is set once the next instruction completes
    interruptsEnablePending: boolean;
    mode: CpuMode;
}

export interface LockInfo {
    opcode: number;
    address: number;
}

// Cost of an idle call while halted or stopped.
export const IDLE_CYCLES = 1;
export const INTERRUPT_DISPATCH_CYCLES = 5;

export class Cpu {
    constructor(private bus: Bus, private clock: Clock, private interrupt: Interrupt, private system: System) {
        const r16 = new Uint16Array(5);
        const r8 = new Uint8Array(r16.buffer);

        this.state = {
            r8,
            r16,
            p: 0x00,
            interruptsEnabled: false,
            interruptsEnablePending: false,
            mode: CpuMode.running,
        };
    }

    reset(): void {
        this.state.r16[r16.af] = 0x01b0;
        this.state.r16[r16.bc] = 0x0013;
        this.state.r16[r16.de] = 0x00d8;
        this.state.r16[r16.hl] = 0x014d;
        this.state.r16[r16.sp] = 0xfffe;
        this.state.p = 0x0100;
        this.state.interruptsEnabled = false;
        this.state.interruptsEnablePending = false;
        this.state.mode = CpuMode.running;
    }

    /**
     * Advance by exactly one unit of work: an idle cycle, an interrupt dispatch or one instruction.
     * Returns the M-cycles consumed, 0 once the CPU is locked.
     */
    run(): number {
        const cycles = this.runOnce();
        if (cycles > 0) this.clock.increment(cycles);

        return cycles;
    }

    step(count: number): number {
        let cycles = 0;

        for (let i = 0; i < count; i++) {
            if (this.system.isTrap || this.state.mode === CpuMode.locked) break;

            cycles += this.run();
        }

        return cycles;
    }

    // External wake signal for STOP, delivered on joypad input.
    wake(): void {
        if (this.state.mode === CpuMode.stopped) this.state.mode = CpuMode.running;
    }

    getMode(): CpuMode {
        return this.state.mode;
    }

    isLocked(): boolean {
        return this.state.mode === CpuMode.locked;
    }

    printState(): string {
        return `af=${hex16(this.state.r16[r16.af])} bc=${hex16(this.state.r16[r16.bc])} de=${hex16(this.state.r16[r16.de])} hl=${hex16(
            this.state.r16[r16.hl]
        )} s=${hex16(this.state.r16[r16.sp])} p=${hex16(this.state.p)} interrupts=${this.state.interruptsEnabled ? 'on' : 'off'} mode=${describeMode(
            this.state.mode
        )}`;
    }

    private runOnce(): number {
        switch (this.state.mode) {
            case CpuMode.locked:
                return 0;

            case CpuMode.stopped:
                return IDLE_CYCLES;

            case CpuMode.halted:
                if (!this.interrupt.isPending()) return IDLE_CYCLES;
                if (this.state.interruptsEnabled) return this.dispatchInterrupt();

                // IME is off: wake up and continue after HALT without servicing the interrupt
                this.state.mode = CpuMode.running;
                return IDLE_CYCLES;

            case CpuMode.running:
                if (this.state.interruptsEnabled && this.interrupt.isPending()) return this.dispatchInterrupt();

                return this.execute(decodeInstruction(this.bus, this.state.p));
        }
    }

    private dispatchInterrupt(): number {
        const interrupt = this.interrupt.getNext();
        if (interrupt === 0) return IDLE_CYCLES;

        this.interrupt.clear(interrupt);
        this.state.interruptsEnabled = false;
        this.state.interruptsEnablePending = false;
        this.state.mode = CpuMode.running;

        this.stackPush16(this.state.p);
        this.state.p = getIrqVector(interrupt);

        return INTERRUPT_DISPATCH_CYCLES;
    }

    private execute(instruction: Instruction): number {
        const address = this.state.p;
        const enableInterrupts = this.state.interruptsEnablePending;

        this.onExecute.dispatch(address);

        const cycles = this.dispatch(instruction);

        if (enableInterrupts && this.state.interruptsEnablePending) {
            this.state.interruptsEnabled = true;
            this.state.interruptsEnablePending = false;
        }

        if (this.state.mode !== CpuMode.locked) this.onAfterExecute.dispatch(this.state.p);

        return cycles;
    }

    private lock(instruction: Instruction): number {
        const info: LockInfo = { opcode: instruction.opcode, address: this.state.p };

        this.state.mode = CpuMode.locked;
        this.system.error(`CPU locked up: undefined opcode ${hex8(info.opcode)} at ${hex16(info.address)}`);
        this.onLock.dispatch(info);

        return 0;
    }

    private stackPush16(value: number): void {
        this.state.r16[r16.sp] = (this.state.r16[r16.sp] - 2) & 0xffff;
        this.bus.write16(this.state.r16[r16.sp], value & 0xffff);
    }

    private stackPop16(): number {
        const value = this.bus.read16(this.state.r16[r16.sp]);
        this.state.r16[r16.sp] = (this.state.r16[r16.sp] + 2) & 0xffff;

        return value;
    }

    private dispatch(instruction: Instruction): number {
        switch (instruction.op) {
            case Operation.invalid:
            case Operation.cb:
                return this.lock(instruction);

            case Operation.adc:
                return this.opAdc(instruction);

            case Operation.add:
                return this.opAdd(instruction);

            case Operation.add16:
                return this.opAdd16(instruction);

            case Operation.addsp:
                return this.opAddSp(instruction);

            case Operation.and:
                return this.opAnd(instruction);

            case Operation.call:
                return this.opCall(instruction);

            case Operation.ccf:
                return this.opCcf(instruction);

            case Operation.cp:
                return this.opCp(instruction);

            case Operation.cpl:
                return this.opCpl(instruction);

            case Operation.daa:
                return this.opDaa(instruction);

            case Operation.dec:
                return this.opDec(instruction);

            case Operation.dec16:
                return this.opDec16(instruction);

            case Operation.di:
                return this.opDi(instruction);

            case Operation.ei:
                return this.opEi(instruction);

            case Operation.halt:
                return this.opHalt(instruction);

            case Operation.inc:
                return this.opInc(instruction);

            case Operation.inc16:
                return this.opInc16(instruction);

            case Operation.jp:
                return this.opJp(instruction);

            case Operation.jr:
                return this.opJr(instruction);

            case Operation.ld:
                return this.opLd(instruction);

            case Operation.ldd:
                return this.opLdd(instruction);

            case Operation.ldhl:
                return this.opLdhl(instruction);

            case Operation.ldi:
                return this.opLdi(instruction);

            case Operation.nop:
                return this.next(instruction);

            case Operation.or:
                return this.opOr(instruction);

            case Operation.pop:
                return this.opPop(instruction);

            case Operation.push:
                return this.opPush(instruction);

            case Operation.ret:
                return this.opRet(instruction);

            case Operation.reti:
                return this.opReti(instruction);

            case Operation.rlca:
                return this.opRlca(instruction);

            case Operation.rla:
                return this.opRla(instruction);

            case Operation.rrca:
                return this.opRrca(instruction);

            case Operation.rra:
                return this.opRra(instruction);

            case Operation.rst:
                return this.opRst(instruction);

            case Operation.sbc:
                return this.opSbc(instruction);

            case Operation.scf:
                return this.opScf(instruction);

            case Operation.stop:
                return this.opStop(instruction);

            case Operation.sub:
                return this.opSub(instruction);

            case Operation.xor:
                return this.opXor(instruction);

            case Operation.bit:
                return this.opBit(instruction);

            case Operation.set:
                return this.opSet(instruction);

            case Operation.res:
                return this.opRes(instruction);

            case Operation.swap:
                return this.opSwap(instruction);

            case Operation.rlc:
                return this.opRlc(instruction);

            case Operation.rl:
                return this.opRl(instruction);

            case Operation.rrc:
                return this.opRrc(instruction);

            case Operation.rr:
                return this.opRr(instruction);

            case Operation.sla:
                return this.opSla(instruction);

            case Operation.sra:
                return this.opSra(instruction);

            case Operation.srl:
                return this.opSrl(instruction);
        }
    }

    // Move on to the next instruction.
    private next(instruction: Instruction): number {
        this.state.p = (this.state.p + instruction.len) & 0xffff;

        return instruction.cycles;
    }

    private opAdc(instruction: Instruction): number {
        const operand1 = this.getArg1(instruction);
        const operand2 = this.getArg2(instruction);
        const flagc = (this.state.r8[r8.f] & flag.c) >>> 4;
        const result = operand1 + operand2 + flagc;

        this.setArg1(instruction, result);

        // prettier-ignore
        this.state.r8[r8.f] =
            ((result & 0xff) === 0 ? flag.z : 0x00) |
            ((operand1 & 0xf) + (operand2 & 0xf) + flagc > 0xf ? flag.h : 0x00) |
            (result > 0xff ? flag.c : 0x00);

        return this.next(instruction);
    }

    private opAdd(instruction: Instruction): number {
        const operand1 = this.getArg1(instruction);
        const operand2 = this.getArg2(instruction);
        const result = operand1 + operand2;

        this.setArg1(instruction, result);

        // prettier-ignore
        this.state.r8[r8.f] =
            ((result & 0xff) === 0 ? flag.z : 0x00) |
            ((operand1 & 0xf) + (operand2 & 0xf) > 0xf ? flag.h : 0x00) |
            (result > 0xff ? flag.c : 0x00);

        return this.next(instruction);
    }

    private opAdd16(instruction: Instruction): number {
        const operand1 = this.getArg1(instruction);
        const operand2 = this.getArg2(instruction);
        const result = operand1 + operand2;

        this.setArg1(instruction, result);

        // prettier-ignore
        this.state.r8[r8.f] =
            (this.state.r8[r8.f] & flag.z) |
            ((operand1 & 0x0fff) + (operand2 & 0x0fff) > 0x0fff ? flag.h : 0x00) |
            (result > 0xffff ? flag.c : 0x00);

        return this.next(instruction);
    }

    private opAddSp(instruction: Instruction): number {
        this.setArg1(instruction, this.addSpOffset(instruction));

        return this.next(instruction);
    }

    private opLdhl(instruction: Instruction): number {
        this.setArg1(instruction, this.addSpOffset(instruction));

        return this.next(instruction);
    }

    // SP + signed offset; carries are computed on the low byte as an unsigned addition.
    private addSpOffset(instruction: Instruction): number {
        const sp = this.state.r16[r16.sp];
        const offset = this.getArg2(instruction);

        // prettier-ignore
        this.state.r8[r8.f] =
            ((sp & 0x0f) + (offset & 0x0f) > 0x0f ? flag.h : 0x00) |
            ((sp & 0xff) + (offset & 0xff) > 0xff ? flag.c : 0x00);

        return (sp + offset) & 0xffff;
    }

    private opAnd(instruction: Instruction): number {
        this.state.r8[r8.a] &= this.getArg1(instruction);
        this.state.r8[r8.f] = flag.h | (this.state.r8[r8.a] === 0 ? flag.z : 0x00);

        return this.next(instruction);
    }

    private opCall(instruction: Instruction): number {
        if (!this.evaluateCondition(instruction)) return this.next(instruction);

        const target = this.getArg1(instruction);

        this.stackPush16(this.state.p + instruction.len);
        this.state.p = target;

        return instruction.cyclesBranch;
    }

    private opCcf(instruction: Instruction): number {
        // prettier-ignore
        this.state.r8[r8.f] =
            (this.state.r8[r8.f] & flag.z) |
            ((this.state.r8[r8.f] & flag.c) ^ flag.c);

        return this.next(instruction);
    }

    private opCp(instruction: Instruction): number {
        this.subtract(this.getArg1(instruction), 0);

        return this.next(instruction);
    }

    private opCpl(instruction: Instruction): number {
        this.state.r8[r8.a] ^= 0xff;
        this.state.r8[r8.f] |= flag.n | flag.h;

        return this.next(instruction);
    }

    private opDaa(instruction: Instruction): number {
        let operand = this.state.r8[r8.a];
        const flags = this.state.r8[r8.f];
        let carry = flags & flag.c;

        if (flags & flag.n) {
            if (flags & flag.h) operand -= 0x06;
            if (flags & flag.c) operand -= 0x60;
        } else {
            if (flags & flag.c || operand > 0x99) {
                operand += 0x60;
                carry = flag.c;
            }

            if (flags & flag.h || (operand & 0x0f) > 0x09) operand += 0x06;
        }

        operand &= 0xff;

        this.state.r8[r8.a] = operand;
        this.state.r8[r8.f] = (operand === 0 ? flag.z : 0x00) | (flags & flag.n) | carry;

        return this.next(instruction);
    }

    private opDec(instruction: Instruction): number {
        const operand = this.getArg1(instruction);
        const result = (operand - 0x01) & 0xff;

        this.setArg1(instruction, result);

        // prettier-ignore
        this.state.r8[r8.f] =
            (this.state.r8[r8.f] & flag.c) |
            flag.n |
            (result === 0 ? flag.z : 0x00) |
            ((operand & 0x0f) === 0 ? flag.h : 0x00);

        return this.next(instruction);
    }

    private opDec16(instruction: Instruction): number {
        this.setArg1(instruction, this.getArg1(instruction) - 0x01);

        return this.next(instruction);
    }

    private opDi(instruction: Instruction): number {
        this.state.interruptsEnabled = false;
        this.state.interruptsEnablePending = false;

        return this.next(instruction);
    }

    private opEi(instruction: Instruction): number {
        if (!this.state.interruptsEnabled) this.state.interruptsEnablePending = true;

        return this.next(instruction);
    }

    private opHalt(instruction: Instruction): number {
        this.state.mode = CpuMode.halted;

        return this.next(instruction);
    }

    private opInc(instruction: Instruction): number {
        const operand = this.getArg1(instruction);
        const result = (operand + 0x01) & 0xff;

        this.setArg1(instruction, result);

        // prettier-ignore
        this.state.r8[r8.f] =
            (this.state.r8[r8.f] & flag.c) |
            (result === 0 ? flag.z : 0x00) |
            ((operand & 0x0f) === 0x0f ? flag.h : 0x00);

        return this.next(instruction);
    }

    private opInc16(instruction: Instruction): number {
        this.setArg1(instruction, this.getArg1(instruction) + 0x01);

        return this.next(instruction);
    }

    private opJp(instruction: Instruction): number {
        if (!this.evaluateCondition(instruction)) return this.next(instruction);

        this.state.p = this.getArg1(instruction);

        return instruction.cyclesBranch;
    }

    private opJr(instruction: Instruction): number {
        if (!this.evaluateCondition(instruction)) return this.next(instruction);

        const displacement = this.getArg1(instruction);
        this.state.p = (this.state.p + instruction.len + displacement) & 0xffff;

        return instruction.cyclesBranch;
    }

    private opLd(instruction: Instruction): number {
        this.setArg1(instruction, this.getArg2(instruction));

        return this.next(instruction);
    }

    private opLdd(instruction: Instruction): number {
        this.setArg1(instruction, this.getArg2(instruction));
        this.state.r16[r16.hl]--;

        return this.next(instruction);
    }

    private opLdi(instruction: Instruction): number {
        this.setArg1(instruction, this.getArg2(instruction));
        this.state.r16[r16.hl]++;

        return this.next(instruction);
    }

    private opOr(instruction: Instruction): number {
        this.state.r8[r8.a] |= this.getArg1(instruction);
        this.state.r8[r8.f] = this.state.r8[r8.a] === 0 ? flag.z : 0x00;

        return this.next(instruction);
    }

    private opPop(instruction: Instruction): number {
        this.setArg1(instruction, this.stackPop16());

        // the low nibble of F is hardwired to zero
        if (instruction.par1 === r16.af) this.state.r8[r8.f] &= 0xf0;

        return this.next(instruction);
    }

    private opPush(instruction: Instruction): number {
        this.stackPush16(this.getArg1(instruction));

        return this.next(instruction);
    }

    private opRet(instruction: Instruction): number {
        if (!this.evaluateCondition(instruction)) return this.next(instruction);

        this.state.p = this.stackPop16();

        return instruction.cyclesBranch;
    }

    private opReti(instruction: Instruction): number {
        this.state.p = this.stackPop16();

        this.state.interruptsEnabled = true;
        this.state.interruptsEnablePending = false;

        return instruction.cycles;
    }

    private opRlca(instruction: Instruction): number {
        const operand = this.state.r8[r8.a];

        this.state.r8[r8.a] = (operand << 1) | (operand >>> 7);
        this.state.r8[r8.f] = (operand & 0x80) >>> 3;

        return this.next(instruction);
    }

    private opRla(instruction: Instruction): number {
        const operand = this.state.r8[r8.a];

        this.state.r8[r8.a] = (operand << 1) | ((this.state.r8[r8.f] & flag.c) >>> 4);
        this.state.r8[r8.f] = (operand & 0x80) >>> 3;

        return this.next(instruction);
    }

    private opRrca(instruction: Instruction): number {
        const operand = this.state.r8[r8.a];

        this.state.r8[r8.a] = (operand >>> 1) | (operand << 7);
        this.state.r8[r8.f] = (operand & 0x01) << 4;

        return this.next(instruction);
    }

    private opRra(instruction: Instruction): number {
        const operand = this.state.r8[r8.a];

        this.state.r8[r8.a] = (operand >>> 1) | ((this.state.r8[r8.f] & flag.c) << 3);
        this.state.r8[r8.f] = (operand & 0x01) << 4;

        return this.next(instruction);
    }

    private opRst(instruction: Instruction): number {
        this.stackPush16(this.state.p + instruction.len);
        this.state.p = this.getArg1(instruction);

        return instruction.cycles;
    }

    private opSbc(instruction: Instruction): number {
        this.state.r8[r8.a] = this.subtract(this.getArg2(instruction), (this.state.r8[r8.f] & flag.c) >>> 4);

        return this.next(instruction);
    }

    private opScf(instruction: Instruction): number {
        this.state.r8[r8.f] = (this.state.r8[r8.f] & flag.z) | flag.c;

        return this.next(instruction);
    }

    private opStop(instruction: Instruction): number {
        this.state.mode = CpuMode.stopped;

        return this.next(instruction);
    }

    private opSub(instruction: Instruction): number {
        this.state.r8[r8.a] = this.subtract(this.getArg1(instruction), 0);

        return this.next(instruction);
    }

    // A - operand - carry, sets all flags and returns the result without storing it.
    private subtract(operand: number, carry: number): number {
        const a = this.state.r8[r8.a];
        const result = a - operand - carry;

        // prettier-ignore
        this.state.r8[r8.f] =
            ((result & 0xff) === 0 ? flag.z : 0x00) |
            flag.n |
            ((a & 0x0f) - (operand & 0x0f) - carry < 0 ? flag.h : 0x00) |
            (result < 0 ? flag.c : 0x00);

        return result & 0xff;
    }

    private opXor(instruction: Instruction): number {
        this.state.r8[r8.a] ^= this.getArg1(instruction);
        this.state.r8[r8.f] = this.state.r8[r8.a] === 0 ? flag.z : 0x00;

        return this.next(instruction);
    }

    private opBit(instruction: Instruction): number {
        const operand = this.getArg2(instruction);
        const bitMask = 1 << this.getArg1(instruction);

        // prettier-ignore
        this.state.r8[r8.f] =
            (this.state.r8[r8.f] & flag.c) |
            flag.h |
            (operand & bitMask ? 0x00 : flag.z);

        return this.next(instruction);
    }

    private opSet(instruction: Instruction): number {
        this.setArg2(instruction, this.getArg2(instruction) | (1 << this.getArg1(instruction)));

        return this.next(instruction);
    }

    private opRes(instruction: Instruction): number {
        this.setArg2(instruction, this.getArg2(instruction) & ~(1 << this.getArg1(instruction)));

        return this.next(instruction);
    }

    private opSwap(instruction: Instruction): number {
        const operand = this.getArg1(instruction);
        const result = ((operand & 0xf0) >>> 4) | ((operand & 0x0f) << 4);

        this.setArg1(instruction, result);
        this.state.r8[r8.f] = result === 0 ? flag.z : 0x00;

        return this.next(instruction);
    }

    private opRlc(instruction: Instruction): number {
        const operand = this.getArg1(instruction);

        return this.shift(instruction, ((operand << 1) | (operand >>> 7)) & 0xff, operand & 0x80);
    }

    private opRl(instruction: Instruction): number {
        const operand = this.getArg1(instruction);

        return this.shift(instruction, ((operand << 1) | ((this.state.r8[r8.f] & flag.c) >>> 4)) & 0xff, operand & 0x80);
    }

    private opRrc(instruction: Instruction): number {
        const operand = this.getArg1(instruction);

        return this.shift(instruction, ((operand >>> 1) | (operand << 7)) & 0xff, operand & 0x01);
    }

    private opRr(instruction: Instruction): number {
        const operand = this.getArg1(instruction);

        return this.shift(instruction, ((operand >>> 1) | ((this.state.r8[r8.f] & flag.c) << 3)) & 0xff, operand & 0x01);
    }

    private opSla(instruction: Instruction): number {
        const operand = this.getArg1(instruction);

        return this.shift(instruction, (operand << 1) & 0xff, operand & 0x80);
    }

    private opSra(instruction: Instruction): number {
        const operand = this.getArg1(instruction);

        return this.shift(instruction, (operand >>> 1) | (operand & 0x80), operand & 0x01);
    }

    private opSrl(instruction: Instruction): number {
        const operand = this.getArg1(instruction);

        return this.shift(instruction, operand >>> 1, operand & 0x01);
    }

    // Common tail of the prefixed rotates and shifts: store, Z from the result, C from the bit shifted out.
    private shift(instruction: Instruction, result: number, carryOut: number): number {
        this.setArg1(instruction, result);
        this.state.r8[r8.f] = (result === 0 ? flag.z : 0x00) | (carryOut !== 0 ? flag.c : 0x00);

        return this.next(instruction);
    }

    private getArg(par: number, mode: AddressingMode): number {
        switch (mode) {
            case AddressingMode.implicit:
            case AddressingMode.bit:
                return par;

            case AddressingMode.imm8:
                return this.bus.read((this.state.p + 0x01) & 0xffff);

            case AddressingMode.imm8sign:
                return signed8(this.bus.read((this.state.p + 0x01) & 0xffff));

            case AddressingMode.imm8io:
                return this.bus.read(0xff00 + this.bus.read((this.state.p + 0x01) & 0xffff));

            case AddressingMode.reg8:
                return this.state.r8[par];

            case AddressingMode.reg8io:
                return this.bus.read(0xff00 + this.state.r8[par]);

            case AddressingMode.imm16:
                return this.bus.read16((this.state.p + 0x01) & 0xffff);

            case AddressingMode.imm16ind8:
                return this.bus.read(this.bus.read16((this.state.p + 0x01) & 0xffff));

            case AddressingMode.imm16ind16:
                return this.bus.read16(this.bus.read16((this.state.p + 0x01) & 0xffff));

            case AddressingMode.reg16:
                return this.state.r16[par];

            case AddressingMode.reg16ind8:
                return this.bus.read(this.state.r16[par]);

            case AddressingMode.none:
                throw new Error(`operand requested from instruction without operand at ${hex16(this.state.p)}`);
        }
    }

    private getArg1(instruction: Instruction): number {
        return this.getArg(instruction.par1, instruction.mode1);
    }

    private getArg2(instruction: Instruction): number {
        return this.getArg(instruction.par2, instruction.mode2);
    }

    private setArg(par: number, mode: AddressingMode, value: number): void {
        switch (mode) {
            case AddressingMode.imm8io:
                this.bus.write(0xff00 + this.bus.read((this.state.p + 0x01) & 0xffff), value & 0xff);
                break;

            case AddressingMode.reg8:
                this.state.r8[par] = value & 0xff;
                break;

            case AddressingMode.reg8io:
                this.bus.write(0xff00 + this.state.r8[par], value & 0xff);
                break;

            case AddressingMode.imm16ind8:
                this.bus.write(this.bus.read16((this.state.p + 0x01) & 0xffff), value & 0xff);
                break;

            case AddressingMode.imm16ind16:
                this.bus.write16(this.bus.read16((this.state.p + 0x01) & 0xffff), value & 0xffff);
                break;

            case AddressingMode.reg16ind8:
                this.bus.write(this.state.r16[par], value & 0xff);
                break;

            case AddressingMode.reg16:
                this.state.r16[par] = value & 0xffff;
                break;

            default:
                throw new Error(`bad addressing mode ${hex8(mode)} for write at ${hex16(this.state.p)}`);
        }
    }

    private setArg1(instruction: Instruction, value: number): void {
        this.setArg(instruction.par1, instruction.mode1, value);
    }

    private setArg2(instruction: Instruction, value: number): void {
        this.setArg(instruction.par2, instruction.mode2, value);
    }

    private evaluateCondition(instruction: Instruction): boolean {
        switch (instruction.condition) {
            case Condition.c:
                return (this.state.r8[r8.f] & flag.c) !== 0x00;

            case Condition.nc:
                return (this.state.r8[r8.f] & flag.c) === 0x00;

            case Condition.z:
                return (this.state.r8[r8.f] & flag.z) !== 0x00;

            case Condition.nz:
                return (this.state.r8[r8.f] & flag.z) === 0x00;

            case Condition.always:
                return true;
        }
    }

    readonly onExecute = new Event<number>();
    readonly onAfterExecute = new Event<number>();
    readonly onLock = new Event<LockInfo>();

    readonly state: CpuState;
}

export function describeMode(mode: CpuMode): string {
    switch (mode) {
        case CpuMode.running:
            return 'running';

        case CpuMode.halted:
            return 'halted';

        case CpuMode.stopped:
            return 'stopped';

        case CpuMode.locked:
            return 'locked';
    }
}
