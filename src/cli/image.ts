import { SCREEN_HEIGHT, SCREEN_WIDTH } from '../emulator/ppu/frame-buffer';

import { PNG } from 'pngjs';

// Frames are ABGR words: red in the lowest byte, alpha in the highest.
export function encodeFrame(frame: Uint32Array): Buffer {
    const png = new PNG({ width: SCREEN_WIDTH, height: SCREEN_HEIGHT });

    for (let i = 0; i < SCREEN_WIDTH * SCREEN_HEIGHT; i++) {
        const pixel = frame[i];

        png.data[4 * i] = pixel & 0xff;
        png.data[4 * i + 1] = (pixel >>> 8) & 0xff;
        png.data[4 * i + 2] = (pixel >>> 16) & 0xff;
        png.data[4 * i + 3] = pixel >>> 24;
    }

    return PNG.sync.write(png);
}

export function decodeFrame(data: Uint8Array): Uint32Array {
    const png = PNG.sync.read(Buffer.from(data));

    if (png.width !== SCREEN_WIDTH || png.height !== SCREEN_HEIGHT) {
        throw new Error(`reference image is ${png.width}x${png.height}, expected ${SCREEN_WIDTH}x${SCREEN_HEIGHT}`);
    }

    const frame = new Uint32Array(SCREEN_WIDTH * SCREEN_HEIGHT);
    for (let i = 0; i < frame.length; i++) {
        frame[i] = ((png.data[4 * i + 3] << 24) | (png.data[4 * i + 2] << 16) | (png.data[4 * i + 1] << 8) | png.data[4 * i]) >>> 0;
    }

    return frame;
}

// Number of differing pixels.
export function compareFrames(actual: Uint32Array, expected: Uint32Array): number {
    if (actual.length !== expected.length) throw new Error('frame size mismatch');

    let mismatches = 0;
    for (let i = 0; i < actual.length; i++) {
        if (actual[i] !== expected[i]) mismatches++;
    }

    return mismatches;
}
