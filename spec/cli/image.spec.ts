import { compareFrames, decodeFrame, encodeFrame } from '../../src/cli/image';

import { PNG } from 'pngjs';

describe('Frame images', () => {
    function gradient(): Uint32Array {
        const frame = new Uint32Array(160 * 144);

        for (let y = 0; y < 144; y++) {
            for (let x = 0; x < 160; x++) frame[y * 160 + x] = (0xff000000 | (y << 8) | x) >>> 0;
        }

        return frame;
    }

    it('writes a 160x144 PNG with the frame colors', () => {
        const png = PNG.sync.read(encodeFrame(gradient()));
        const offset = 4 * (10 * 160 + 20);

        expect([png.width, png.height]).toEqual([160, 144]);
        expect(Array.from(png.data.subarray(offset, offset + 4))).toEqual([20, 10, 0, 0xff]);
    });

    it('reads back what it writes', () => {
        const frame = gradient();

        expect(compareFrames(decodeFrame(encodeFrame(frame)), frame)).toBe(0);
    });

    it('rejects images of the wrong size', () => {
        const png = new PNG({ width: 10, height: 10 });

        expect(() => decodeFrame(PNG.sync.write(png))).toThrow('reference image is 10x10, expected 160x144');
    });

    it('counts differing pixels', () => {
        const frame = gradient();
        const other = frame.slice();

        other[0] = 0;
        other[23039] = 0;

        expect(compareFrames(frame, other)).toBe(2);
        expect(() => compareFrames(frame, new Uint32Array(4))).toThrow('frame size mismatch');
    });
});
