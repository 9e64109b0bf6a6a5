import { hex16, hex8, signed8, signedHex8 } from '../helper/format';
import { r16, r8 } from './cpu';

import { Bus } from './bus';

export const enum Operation {
    invalid,

    adc,
    add,
    add16,
    addsp,
    and,
    call,
    cb,
    ccf,
    cp,
    cpl,
    daa,
    dec,
    dec16,
    di,
    ei,
    halt,
    inc,
    inc16,
    jp,
    jr,
    ld,
    ldd,
    ldhl,
    ldi,
    nop,
    or,
    pop,
    push,
    ret,
    reti,
    rla,
    rlca,
    rra,
    rrca,
    rst,
    sbc,
    scf,
    stop,
    sub,
    xor,

    // prefix cb
    bit,
    res,
    rl,
    rlc,
    rr,
    rrc,
    set,
    sla,
    sra,
    srl,
    swap,
}

export const enum AddressingMode {
    none,
    implicit,

    bit,

    imm8,
    imm8sign,
    imm8io,
    reg8,
    reg8io,

    imm16,
    imm16ind8,
    imm16ind16,
    reg16,
    reg16ind8,
}

export const enum Condition {
    always,
    z,
    nz,
    c,
    nc,
}

export interface Instruction {
    // Prefixed opcodes live at 0x100 + second byte.
    opcode: number;
    op: Operation;
    par1: number;
    mode1: AddressingMode;
    par2: number;
    mode2: AddressingMode;
    // M-cycles; conditional instructions take `cyclesBranch` if the condition holds
    cycles: number;
    cyclesBranch: number;
    len: number;
    condition: Condition;
}

export function decodeInstruction(bus: Bus, address: number): Instruction {
    let opcode = bus.read(address);

    if (0xcb === opcode) opcode = bus.read((address + 1) & 0xffff) + 0x100;

    return instructions[opcode];
}

export function getInstruction(opcode: number): Instruction {
    return instructions[opcode];
}

export function disassembleInstruction(bus: Bus, address: number): string {
    const instruction = decodeInstruction(bus, address);
    if (instruction.op === Operation.invalid) return `DB ${hex8(instruction.opcode)}`;

    const op = disassembleOperation(instruction.op);
    const condition = disassembleCondition(instruction.condition);

    if (instruction.op === Operation.ldhl) {
        const offset = signed8(bus.read((address + 1) & 0xffff));

        return `LD HL, SP ${offset < 0 ? '-' : '+'} ${hex8(Math.abs(offset))}`;
    }

    switch (true) {
        case instruction.mode1 === AddressingMode.none && instruction.mode2 === AddressingMode.none:
            return `${op}${condition !== '' ? ` ${condition}` : ''}`;

        case instruction.mode2 === AddressingMode.none: {
            const par1 = disassembleOperationParameter(bus, address, instruction.par1, instruction.mode1);
            return `${op}${condition !== '' ? ` ${condition},` : ''} ${par1}`;
        }

        case instruction.mode1 === AddressingMode.none: {
            const par2 = disassembleOperationParameter(bus, address, instruction.par2, instruction.mode2);
            return `${op} ${par2}`;
        }

        default: {
            const par1 = disassembleOperationParameter(bus, address, instruction.par1, instruction.mode1);
            const par2 = disassembleOperationParameter(bus, address, instruction.par2, instruction.mode2);
            return `${op} ${par1}, ${par2}`;
        }
    }
}

function disassembleCondition(condition: Condition): string {
    switch (condition) {
        case Condition.always:
            return '';

        case Condition.c:
            return 'C';

        case Condition.nc:
            return 'NC';

        case Condition.z:
            return 'Z';

        case Condition.nz:
            return 'NZ';
    }
}

function disassembleOperation(operation: Operation): string {
    switch (operation) {
        case Operation.invalid:
            return 'DB';

        case Operation.adc:
            return 'ADC';

        case Operation.add:
        case Operation.add16:
        case Operation.addsp:
            return 'ADD';

        case Operation.and:
            return 'AND';

        case Operation.call:
            return 'CALL';

        case Operation.cb:
            return 'PREFIX CB';

        case Operation.ccf:
            return 'CCF';

        case Operation.cp:
            return 'CP';

        case Operation.cpl:
            return 'CPL';

        case Operation.daa:
            return 'DAA';

        case Operation.dec:
        case Operation.dec16:
            return 'DEC';

        case Operation.di:
            return 'DI';

        case Operation.ei:
            return 'EI';

        case Operation.halt:
            return 'HALT';

        case Operation.inc:
        case Operation.inc16:
            return 'INC';

        case Operation.jp:
            return 'JP';

        case Operation.jr:
            return 'JR';

        case Operation.ld:
        case Operation.ldhl:
            return 'LD';

        case Operation.ldd:
            return 'LDD';

        case Operation.ldi:
            return 'LDI';

        case Operation.nop:
            return 'NOP';

        case Operation.or:
            return 'OR';

        case Operation.pop:
            return 'POP';

        case Operation.push:
            return 'PUSH';

        case Operation.ret:
            return 'RET';

        case Operation.reti:
            return 'RETI';

        case Operation.rlca:
            return 'RLCA';

        case Operation.rrca:
            return 'RRCA';

        case Operation.rla:
            return 'RLA';

        case Operation.rra:
            return 'RRA';

        case Operation.rst:
            return 'RST';

        case Operation.sub:
            return 'SUB';

        case Operation.sbc:
            return 'SBC';

        case Operation.scf:
            return 'SCF';

        case Operation.stop:
            return 'STOP';

        case Operation.xor:
            return 'XOR';

        case Operation.rlc:
            return 'RLC';

        case Operation.rrc:
            return 'RRC';

        case Operation.rl:
            return 'RL';

        case Operation.rr:
            return 'RR';

        case Operation.sla:
            return 'SLA';

        case Operation.sra:
            return 'SRA';

        case Operation.swap:
            return 'SWAP';

        case Operation.srl:
            return 'SRL';

        case Operation.bit:
            return 'BIT';

        case Operation.res:
            return 'RES';

        case Operation.set:
            return 'SET';
    }
}

function disassembleOperationParameter(bus: Bus, address: number, par: number, mode: AddressingMode): string {
    switch (mode) {
        case AddressingMode.none:
            return '';

        case AddressingMode.implicit:
            return `${hex8(par)}`;

        case AddressingMode.bit:
            return `${par}`;

        case AddressingMode.imm8:
            return `${hex8(bus.read((address + 1) & 0xffff))}`;

        case AddressingMode.imm8sign:
            return `${signedHex8(bus.read((address + 1) & 0xffff))}`;

        case AddressingMode.imm8io:
            return `(FF00 + ${hex8(bus.read((address + 1) & 0xffff))})`;

        case AddressingMode.reg8:
            return `${disassembleR8(par)}`;

        case AddressingMode.reg8io:
            return `(FF00 + ${disassembleR8(par)})`;

        case AddressingMode.imm16:
            return `${hex16(bus.read16((address + 1) & 0xffff))}`;

        case AddressingMode.imm16ind8:
        case AddressingMode.imm16ind16:
            return `(${hex16(bus.read16((address + 1) & 0xffff))})`;

        case AddressingMode.reg16:
            return `${disassembleR16(par)}`;

        case AddressingMode.reg16ind8:
            return `(${disassembleR16(par)})`;
    }
}

function disassembleR8(reg: r8): string {
    const MNEMONICS = ['F', 'A', 'C', 'B', 'E', 'D', 'L', 'H'];

    return MNEMONICS[reg];
}

function disassembleR16(reg: r16): string {
    const MNEMONICS = ['AF', 'BC', 'DE', 'HL', 'SP'];

    return MNEMONICS[reg];
}

function apply(opcode: number, instruction: Partial<Instruction>): void {
    opcode = (opcode & 0xff00) >>> 8 === 0xcb ? (opcode & 0x00ff) + 0x100 : opcode;

    if (instructions[opcode].op !== Operation.invalid) {
        throw new Error(`opcode ${hex16(opcode)} is already assigned`);
    }

    const cycles = instruction.cycles ?? 1;

    instructions[opcode] = {
        ...instructions[opcode],
        cyclesBranch: cycles,
        ...instruction,
        cycles,
        opcode,
    };
}

const instructions = new Array<Instruction>(0x200);

for (let i = 0; i < 0x200; i++)
    instructions[i] = {
        opcode: i,
        op: Operation.invalid,
        par1: 0,
        mode1: AddressingMode.none,
        par2: 0,
        mode2: AddressingMode.none,
        cycles: 0,
        cyclesBranch: 0,
        len: 1,
        condition: Condition.always,
    };

// Registers in the order of the three operand bits, 0x06 is (HL).
const R8_OPERANDS = [r8.b, r8.c, r8.d, r8.e, r8.h, r8.l, -1, r8.a];
const CONDITIONS = [Condition.nz, Condition.z, Condition.nc, Condition.c];

apply(0x00, { op: Operation.nop, cycles: 1, len: 1 });
apply(0x10, { op: Operation.stop, cycles: 1, len: 2 });
apply(0x76, { op: Operation.halt, cycles: 1, len: 1 });
apply(0xf3, { op: Operation.di, cycles: 1, len: 1 });
apply(0xfb, { op: Operation.ei, cycles: 1, len: 1 });

apply(0x07, { op: Operation.rlca, cycles: 1, len: 1 });
apply(0x0f, { op: Operation.rrca, cycles: 1, len: 1 });
apply(0x17, { op: Operation.rla, cycles: 1, len: 1 });
apply(0x1f, { op: Operation.rra, cycles: 1, len: 1 });
apply(0x27, { op: Operation.daa, cycles: 1, len: 1 });
apply(0x2f, { op: Operation.cpl, cycles: 1, len: 1 });
apply(0x37, { op: Operation.scf, cycles: 1, len: 1 });
apply(0x3f, { op: Operation.ccf, cycles: 1, len: 1 });

apply(0xc3, { op: Operation.jp, mode1: AddressingMode.imm16, cycles: 4, len: 3 });
apply(0xe9, { op: Operation.jp, par1: r16.hl, mode1: AddressingMode.reg16, cycles: 1, len: 1 });
apply(0x18, { op: Operation.jr, mode1: AddressingMode.imm8sign, cycles: 3, len: 2 });
apply(0xcd, { op: Operation.call, mode1: AddressingMode.imm16, cycles: 6, len: 3 });
apply(0xc9, { op: Operation.ret, cycles: 4, len: 1 });
apply(0xd9, { op: Operation.reti, cycles: 4, len: 1 });

// 0x20, 0x28, 0x30, 0x38 JR cc
// 0xc0, 0xc8, 0xd0, 0xd8 RET cc
// 0xc2, 0xca, 0xd2, 0xda JP cc
// 0xc4, 0xcc, 0xd4, 0xdc CALL cc
CONDITIONS.forEach((condition, i) => {
    apply(0x20 + (i << 3), { op: Operation.jr, mode1: AddressingMode.imm8sign, condition, cycles: 2, cyclesBranch: 3, len: 2 });
    apply(0xc0 + (i << 3), { op: Operation.ret, condition, cycles: 2, cyclesBranch: 5, len: 1 });
    apply(0xc2 + (i << 3), { op: Operation.jp, mode1: AddressingMode.imm16, condition, cycles: 3, cyclesBranch: 4, len: 3 });
    apply(0xc4 + (i << 3), { op: Operation.call, mode1: AddressingMode.imm16, condition, cycles: 3, cyclesBranch: 6, len: 3 });
});

// 0xc7, 0xcf, 0xd7, 0xdf, 0xe7, 0xef, 0xf7, 0xff
for (let target = 0x00; target <= 0x38; target += 0x08) {
    apply(0xc7 + target, { op: Operation.rst, par1: target, mode1: AddressingMode.implicit, cycles: 4, len: 1 });
}

// 0x80 - 0xbf
R8_OPERANDS.forEach((reg, i) => {
    const source: Partial<Instruction> =
        reg === -1 ? { par2: r16.hl, mode2: AddressingMode.reg16ind8, cycles: 2 } : { par2: reg, mode2: AddressingMode.reg8, cycles: 1 };
    const single: Partial<Instruction> =
        reg === -1 ? { par1: r16.hl, mode1: AddressingMode.reg16ind8, cycles: 2 } : { par1: reg, mode1: AddressingMode.reg8, cycles: 1 };

    apply(0x80 + i, { op: Operation.add, par1: r8.a, mode1: AddressingMode.reg8, ...source, len: 1 });
    apply(0x88 + i, { op: Operation.adc, par1: r8.a, mode1: AddressingMode.reg8, ...source, len: 1 });
    apply(0x90 + i, { op: Operation.sub, ...single, len: 1 });
    apply(0x98 + i, { op: Operation.sbc, par1: r8.a, mode1: AddressingMode.reg8, ...source, len: 1 });
    apply(0xa0 + i, { op: Operation.and, ...single, len: 1 });
    apply(0xa8 + i, { op: Operation.xor, ...single, len: 1 });
    apply(0xb0 + i, { op: Operation.or, ...single, len: 1 });
    apply(0xb8 + i, { op: Operation.cp, ...single, len: 1 });
});

apply(0xc6, { op: Operation.add, par1: r8.a, mode1: AddressingMode.reg8, mode2: AddressingMode.imm8, cycles: 2, len: 2 });
apply(0xce, { op: Operation.adc, par1: r8.a, mode1: AddressingMode.reg8, mode2: AddressingMode.imm8, cycles: 2, len: 2 });
apply(0xd6, { op: Operation.sub, mode1: AddressingMode.imm8, cycles: 2, len: 2 });
apply(0xde, { op: Operation.sbc, par1: r8.a, mode1: AddressingMode.reg8, mode2: AddressingMode.imm8, cycles: 2, len: 2 });
apply(0xe6, { op: Operation.and, mode1: AddressingMode.imm8, cycles: 2, len: 2 });
apply(0xee, { op: Operation.xor, mode1: AddressingMode.imm8, cycles: 2, len: 2 });
apply(0xf6, { op: Operation.or, mode1: AddressingMode.imm8, cycles: 2, len: 2 });
apply(0xfe, { op: Operation.cp, mode1: AddressingMode.imm8, cycles: 2, len: 2 });

// 0x40 - 0x7f except 0x76 (HALT)
R8_OPERANDS.forEach((target, i1) =>
    R8_OPERANDS.forEach((source, i2) => {
        const opcode = 0x40 | (i1 << 3) | i2;

        if (target === -1 && source === -1) return;

        if (target === -1) {
            apply(opcode, { op: Operation.ld, par1: r16.hl, mode1: AddressingMode.reg16ind8, par2: source, mode2: AddressingMode.reg8, cycles: 2, len: 1 });
        } else if (source === -1) {
            apply(opcode, { op: Operation.ld, par1: target, mode1: AddressingMode.reg8, par2: r16.hl, mode2: AddressingMode.reg16ind8, cycles: 2, len: 1 });
        } else {
            apply(opcode, { op: Operation.ld, par1: target, mode1: AddressingMode.reg8, par2: source, mode2: AddressingMode.reg8, cycles: 1, len: 1 });
        }
    })
);

// 0x04, 0x0c, 0x14, 0x1c, 0x24, 0x2c, 0x34, 0x3c INC
// 0x05, 0x0d, 0x15, 0x1d, 0x25, 0x2d, 0x35, 0x3d DEC
// 0x06, 0x0e, 0x16, 0x1e, 0x26, 0x2e, 0x36, 0x3e LD r, d8
R8_OPERANDS.forEach((reg, i) => {
    if (reg === -1) {
        apply(0x34, { op: Operation.inc, par1: r16.hl, mode1: AddressingMode.reg16ind8, cycles: 3, len: 1 });
        apply(0x35, { op: Operation.dec, par1: r16.hl, mode1: AddressingMode.reg16ind8, cycles: 3, len: 1 });
        apply(0x36, { op: Operation.ld, par1: r16.hl, mode1: AddressingMode.reg16ind8, mode2: AddressingMode.imm8, cycles: 3, len: 2 });

        return;
    }

    apply(0x04 | (i << 3), { op: Operation.inc, par1: reg, mode1: AddressingMode.reg8, cycles: 1, len: 1 });
    apply(0x05 | (i << 3), { op: Operation.dec, par1: reg, mode1: AddressingMode.reg8, cycles: 1, len: 1 });
    apply(0x06 | (i << 3), { op: Operation.ld, par1: reg, mode1: AddressingMode.reg8, mode2: AddressingMode.imm8, cycles: 2, len: 2 });
});

// 0x01, 0x11, 0x21, 0x31 LD rr, d16
// 0x03, 0x13, 0x23, 0x33 INC rr
// 0x09, 0x19, 0x29, 0x39 ADD HL, rr
// 0x0b, 0x1b, 0x2b, 0x3b DEC rr
[r16.bc, r16.de, r16.hl, r16.sp].forEach((reg, i) => {
    apply((i << 4) | 0x01, { op: Operation.ld, par1: reg, mode1: AddressingMode.reg16, mode2: AddressingMode.imm16, cycles: 3, len: 3 });
    apply((i << 4) | 0x03, { op: Operation.inc16, par1: reg, mode1: AddressingMode.reg16, cycles: 2, len: 1 });
    apply((i << 4) | 0x09, { op: Operation.add16, par1: r16.hl, mode1: AddressingMode.reg16, par2: reg, mode2: AddressingMode.reg16, cycles: 2, len: 1 });
    apply((i << 4) | 0x0b, { op: Operation.dec16, par1: reg, mode1: AddressingMode.reg16, cycles: 2, len: 1 });
});

// 0xc1, 0xd1, 0xe1, 0xf1 POP
// 0xc5, 0xd5, 0xe5, 0xf5 PUSH
[r16.bc, r16.de, r16.hl, r16.af].forEach((reg, i) => {
    apply(0xc1 | (i << 4), { op: Operation.pop, par1: reg, mode1: AddressingMode.reg16, cycles: 3, len: 1 });
    apply(0xc5 | (i << 4), { op: Operation.push, par1: reg, mode1: AddressingMode.reg16, cycles: 4, len: 1 });
});

apply(0x02, { op: Operation.ld, par1: r16.bc, mode1: AddressingMode.reg16ind8, par2: r8.a, mode2: AddressingMode.reg8, cycles: 2, len: 1 });
apply(0x12, { op: Operation.ld, par1: r16.de, mode1: AddressingMode.reg16ind8, par2: r8.a, mode2: AddressingMode.reg8, cycles: 2, len: 1 });
apply(0x0a, { op: Operation.ld, par1: r8.a, mode1: AddressingMode.reg8, par2: r16.bc, mode2: AddressingMode.reg16ind8, cycles: 2, len: 1 });
apply(0x1a, { op: Operation.ld, par1: r8.a, mode1: AddressingMode.reg8, par2: r16.de, mode2: AddressingMode.reg16ind8, cycles: 2, len: 1 });

apply(0x22, { op: Operation.ldi, par1: r16.hl, mode1: AddressingMode.reg16ind8, par2: r8.a, mode2: AddressingMode.reg8, cycles: 2, len: 1 });
apply(0x32, { op: Operation.ldd, par1: r16.hl, mode1: AddressingMode.reg16ind8, par2: r8.a, mode2: AddressingMode.reg8, cycles: 2, len: 1 });
apply(0x2a, { op: Operation.ldi, par1: r8.a, mode1: AddressingMode.reg8, par2: r16.hl, mode2: AddressingMode.reg16ind8, cycles: 2, len: 1 });
apply(0x3a, { op: Operation.ldd, par1: r8.a, mode1: AddressingMode.reg8, par2: r16.hl, mode2: AddressingMode.reg16ind8, cycles: 2, len: 1 });

apply(0x08, { op: Operation.ld, mode1: AddressingMode.imm16ind16, par2: r16.sp, mode2: AddressingMode.reg16, cycles: 5, len: 3 });
apply(0xf9, { op: Operation.ld, par1: r16.sp, mode1: AddressingMode.reg16, par2: r16.hl, mode2: AddressingMode.reg16, cycles: 2, len: 1 });
apply(0xe8, { op: Operation.addsp, par1: r16.sp, mode1: AddressingMode.reg16, mode2: AddressingMode.imm8sign, cycles: 4, len: 2 });
apply(0xf8, { op: Operation.ldhl, par1: r16.hl, mode1: AddressingMode.reg16, mode2: AddressingMode.imm8sign, cycles: 3, len: 2 });

apply(0xe0, { op: Operation.ld, mode1: AddressingMode.imm8io, par2: r8.a, mode2: AddressingMode.reg8, cycles: 3, len: 2 });
apply(0xf0, { op: Operation.ld, par1: r8.a, mode1: AddressingMode.reg8, mode2: AddressingMode.imm8io, cycles: 3, len: 2 });
apply(0xe2, { op: Operation.ld, par1: r8.c, mode1: AddressingMode.reg8io, par2: r8.a, mode2: AddressingMode.reg8, cycles: 2, len: 1 });
apply(0xf2, { op: Operation.ld, par1: r8.a, mode1: AddressingMode.reg8, par2: r8.c, mode2: AddressingMode.reg8io, cycles: 2, len: 1 });
apply(0xea, { op: Operation.ld, mode1: AddressingMode.imm16ind8, par2: r8.a, mode2: AddressingMode.reg8, cycles: 4, len: 3 });
apply(0xfa, { op: Operation.ld, par1: r8.a, mode1: AddressingMode.reg8, mode2: AddressingMode.imm16ind8, cycles: 4, len: 3 });

// Never executed, decodeInstruction resolves the prefix
apply(0xcb, { op: Operation.cb, cycles: 1, len: 1 });

/*********************/
/* prefix cb opcodes */
/*********************/

const SHIFT_OPERATIONS = [Operation.rlc, Operation.rrc, Operation.rl, Operation.rr, Operation.sla, Operation.sra, Operation.swap, Operation.srl];

R8_OPERANDS.forEach((reg, i) => {
    const indirect = reg === -1;

    // 0xcb00 - 0xcb3f
    SHIFT_OPERATIONS.forEach((op, j) =>
        apply(0xcb00 | (j << 3) | i, {
            op,
            ...(indirect ? { par1: r16.hl, mode1: AddressingMode.reg16ind8, cycles: 4 } : { par1: reg, mode1: AddressingMode.reg8, cycles: 2 }),
            len: 2,
        })
    );

    // 0xcb40 - 0xcbff
    for (let bit = 0; bit < 8; bit++) {
        const target: Partial<Instruction> = indirect
            ? { par2: r16.hl, mode2: AddressingMode.reg16ind8 }
            : { par2: reg, mode2: AddressingMode.reg8 };

        apply(0xcb40 | (bit << 3) | i, { op: Operation.bit, par1: bit, mode1: AddressingMode.bit, ...target, cycles: indirect ? 3 : 2, len: 2 });
        apply(0xcb80 | (bit << 3) | i, { op: Operation.res, par1: bit, mode1: AddressingMode.bit, ...target, cycles: indirect ? 4 : 2, len: 2 });
        apply(0xcbc0 | (bit << 3) | i, { op: Operation.set, par1: bit, mode1: AddressingMode.bit, ...target, cycles: indirect ? 4 : 2, len: 2 });
    }
});
