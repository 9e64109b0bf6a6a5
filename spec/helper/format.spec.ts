import { hex16, hex8, signed8, signedHex8 } from '../../src/helper/format';

describe('Formatting helpers', () => {
    it('pads hex values', () => {
        expect(hex8(0x0a)).toBe('0x0a');
        expect(hex8(0x1ff)).toBe('0xff');
        expect(hex16(0x150)).toBe('0x0150');
        expect(hex16(0x1ffff)).toBe('0xffff');
    });

    it('reads bytes as two complement', () => {
        expect(signed8(0x7f)).toBe(127);
        expect(signed8(0x80)).toBe(-128);
        expect(signed8(0xfe)).toBe(-2);
    });

    it('prints signed offsets', () => {
        expect(signedHex8(0xfb)).toBe('-0x05');
        expect(signedHex8(0x08)).toBe('0x08');
    });
});
