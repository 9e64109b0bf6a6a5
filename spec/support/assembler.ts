type Fixup = { at: number; label: string; kind: 'rel8' | 'abs16' };

/**
 * Minimal program builder for test ROMs: raw bytes plus label references that are resolved when the program
 * is linked at its origin.
 */
export class Assembler {
    constructor(private origin: number) {}

    bytes(...bytes: Array<number>): this {
        this.code.push(...bytes);
        return this;
    }

    text(value: string): this {
        for (let i = 0; i < value.length; i++) this.code.push(value.charCodeAt(i));
        this.code.push(0);

        return this;
    }

    label(name: string): this {
        if (this.labels.has(name)) throw new Error(`duplicate label ${name}`);

        this.labels.set(name, this.origin + this.code.length);
        return this;
    }

    // JR and JR cc: opcode followed by a displacement relative to the next instruction.
    jr(opcode: number, label: string): this {
        this.code.push(opcode, 0);
        this.fixups.push({ at: this.code.length - 1, label, kind: 'rel8' });

        return this;
    }

    // Any opcode with a 16 bit address operand: JP, CALL, LD rr, d16 ...
    abs16(opcode: number, label: string): this {
        this.code.push(opcode, 0, 0);
        this.fixups.push({ at: this.code.length - 2, label, kind: 'abs16' });

        return this;
    }

    link(): { address: number; bytes: Array<number> } {
        const bytes = this.code.slice();

        for (const { at, label, kind } of this.fixups) {
            const target = this.labels.get(label);
            if (target === undefined) throw new Error(`undefined label ${label}`);

            if (kind === 'abs16') {
                bytes[at] = target & 0xff;
                bytes[at + 1] = target >>> 8;
            } else {
                const displacement = target - (this.origin + at + 1);
                if (displacement < -128 || displacement > 127) throw new Error(`jump to ${label} out of range`);

                bytes[at] = displacement & 0xff;
            }
        }

        return { address: this.origin, bytes };
    }

    private code: Array<number> = [];
    private labels = new Map<string, number>();
    private fixups: Array<Fixup> = [];
}
