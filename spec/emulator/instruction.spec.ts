import { AddressingMode, Operation, disassembleInstruction, getInstruction } from '../../src/emulator/instruction';
import { lengthFromMode, newEnvironment } from '../support/_helper';

describe('The opcode instructions', () => {
    describe('disassembleInstruction', () => {
        it.each([
            { code: [0xd3], expected: 'DB 0xd3' },
            { code: [0x00], expected: 'NOP' },
            { code: [0x10, 0x00], expected: 'STOP' },
            { code: [0x76], expected: 'HALT' },
            { code: [0xc0], expected: 'RET NZ' },
            { code: [0xff], expected: 'RST 0x38' },
            { code: [0xd6, 0x08], expected: 'SUB 0x08' },
            { code: [0x18, 0x08], expected: 'JR 0x08' },
            { code: [0x20, 0xfb], expected: 'JR NZ, -0x05' },
            { code: [0xc4, 0x00, 0x02], expected: 'CALL NZ, 0x0200' },
            { code: [0xe9], expected: 'JP HL' },
            { code: [0x80], expected: 'ADD A, B' },
            { code: [0x96], expected: 'SUB (HL)' },
            { code: [0x01, 0x34, 0x12], expected: 'LD BC, 0x1234' },
            { code: [0x36, 0x42], expected: 'LD (HL), 0x42' },
            { code: [0x22], expected: 'LDI (HL), A' },
            { code: [0xea, 0x00, 0xc0], expected: 'LD (0xc000), A' },
            { code: [0x08, 0x00, 0xc0], expected: 'LD (0xc000), SP' },
            { code: [0xe0, 0x80], expected: 'LD (FF00 + 0x80), A' },
            { code: [0xf2], expected: 'LD A, (FF00 + C)' },
            { code: [0xe8, 0x02], expected: 'ADD SP, 0x02' },
            { code: [0xf8, 0xfe], expected: 'LD HL, SP - 0x02' },
            { code: [0xf8, 0x05], expected: 'LD HL, SP + 0x05' },
            { code: [0xcb, 0x7c], expected: 'BIT 7, H' },
            { code: [0xcb, 0x46], expected: 'BIT 0, (HL)' },
            { code: [0xcb, 0x37], expected: 'SWAP A' },
        ])('$expected', ({ code, expected }) => {
            const { bus } = newEnvironment(code);

            expect(disassembleInstruction(bus, 0x100)).toBe(expected);
        });
    });

    describe('consistency checks', () => {
        const opcodes = Array.from({ length: 0x200 }, (_, i) => i).filter((opcode) => {
            const op = getInstruction(opcode).op;

            return op !== Operation.invalid && op !== Operation.cb;
        });

        it('defines every prefixed opcode', () => {
            expect(opcodes.filter((opcode) => opcode >= 0x100).length).toBe(0x100);
        });

        it('defines all but eleven unprefixed opcodes and the prefix', () => {
            expect(opcodes.filter((opcode) => opcode < 0x100).length).toBe(0x100 - 12);
        });

        it.each(opcodes)('opcode %i has cycles set', (opcode) => {
            const instruction = getInstruction(opcode);

            expect(instruction.cycles).toBeGreaterThan(0);
            expect(instruction.cyclesBranch).toBeGreaterThanOrEqual(instruction.cycles);
        });

        it.each(opcodes)('opcode %i has a length that matches its operands', (opcode) => {
            const instruction = getInstruction(opcode);

            if (instruction.op === Operation.stop) {
                expect(instruction.len).toBe(2);
            } else {
                expect(instruction.len).toBe((opcode >= 0x100 ? 2 : 1) + lengthFromMode(instruction.mode1) + lengthFromMode(instruction.mode2));
            }
        });

        it.each(opcodes)('opcode %i loads at most one operand from the instruction stream', (opcode) => {
            const instruction = getInstruction(opcode);

            expect(lengthFromMode(instruction.mode1) > 0 && lengthFromMode(instruction.mode2) > 0).toBe(false);
        });

        it('only uses the implicit mode for RST', () => {
            for (const opcode of opcodes) {
                const instruction = getInstruction(opcode);

                if (instruction.mode1 === AddressingMode.implicit) expect(instruction.op).toBe(Operation.rst);
            }
        });
    });
});
