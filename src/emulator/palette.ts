// Shades are 32 bit ABGR, so a frame is an RGBA byte image on little endian hosts.
// Entries 0 - 3 are the four DMG shades from light to dark, entry 4 is the color of the disabled LCD.
export type Palette = Uint32Array;

function fromRGB(r: number, g: number, b: number): number {
    return (0xff000000 | (b << 16) | (g << 8) | r) >>> 0;
}

export const PALETTE_CLASSIC: Palette = new Uint32Array([0xff0fbc9b, 0xff0fac8b, 0xff306230, 0xff0f380f, 0xff9fdcca]);

export const PALETTE_GRAY: Palette = new Uint32Array([
    fromRGB(0xff, 0xff, 0xff),
    fromRGB(0xaa, 0xaa, 0xaa),
    fromRGB(0x55, 0x55, 0x55),
    fromRGB(0x00, 0x00, 0x00),
    fromRGB(0xf0, 0xf0, 0xf0),
]);

export const PALETTES: Readonly<Record<string, Palette>> = {
    classic: PALETTE_CLASSIC,
    gray: PALETTE_GRAY,
};
