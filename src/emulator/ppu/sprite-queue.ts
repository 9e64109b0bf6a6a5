import { Palette } from '../palette';

export const MAX_SPRITES_PER_LINE = 10;

const REVERSE = new Uint8Array(0x100);
for (let i = 0; i < 0x100; i++) {
    REVERSE[i] =
        ((i & 0x01) << 7) |
        ((i & 0x02) << 5) |
        ((i & 0x04) << 3) |
        ((i & 0x08) << 1) |
        ((i & 0x10) >>> 1) |
        ((i & 0x20) >>> 3) |
        ((i & 0x40) >>> 5) |
        ((i & 0x80) >>> 7);
}

export const enum spriteFlag {
    behindBackground = 0x80,
    flipY = 0x40,
    flipX = 0x20,
    palette1 = 0x10,
}

// The sprites of one scanline in drawing priority.
export class SpriteQueue {
    constructor(private vram: Uint8Array, private oam: Uint8Array, private pal0: Palette, private pal1: Palette) {}

    initialize(scanline: number, dblHeight: boolean): void {
        this.length = 0;
        const height = dblHeight ? 16 : 8;

        // Pass 1: select the first ten sprites in OAM that cover the line and insertion sort them by x.
        //
        // sortBuffer is a linked list that maps an OAM index to the index of the next sprite. Entry 40 is
        // the head, so sortBuffer[40] = 11 means that sprite 11 is the first one. Sprites with the same x
        // keep their OAM order: the lower index wins.
        this.sortBuffer[40] = 0xff;

        for (let i = 0; i < 40; i++) {
            const y = (this.positionYCache[i] = this.oam[4 * i] - 16);
            if (y > scanline || y + height <= scanline) continue;

            const positionX = (this.positionXCache[i] = this.oam[4 * i + 1] - 8);

            let previousSprite = 40;

            for (let j = 0; j < this.length; j++) {
                const nextSprite = this.sortBuffer[previousSprite];

                if (positionX >= this.positionXCache[nextSprite]) {
                    previousSprite = nextSprite;
                } else {
                    break;
                }
            }

            this.sortBuffer[i] = this.sortBuffer[previousSprite];
            this.sortBuffer[previousSprite] = i;

            if (++this.length === MAX_SPRITES_PER_LINE) break;
        }

        // Pass 2: fetch the pattern row of every selected sprite
        let index = 40;
        for (let i = 0; i < this.length; i++) {
            index = this.sortBuffer[index];

            const flag = this.oam[4 * index + 3];
            const row = flag & spriteFlag.flipY ? height - 1 - scanline + this.positionYCache[index] : scanline - this.positionYCache[index];

            const tileIndex = this.oam[4 * index + 2];
            const address = (dblHeight ? tileIndex & 0xfe : tileIndex) * 16 + 2 * row;
            const low = this.vram[address];
            const high = this.vram[address + 1];

            // bit 7 is the leftmost pixel, flipped sprites get their bitplanes mirrored
            this.data[i] = flag & spriteFlag.flipX ? REVERSE[low] | (REVERSE[high] << 8) : low | (high << 8);

            this.positionX[i] = this.positionXCache[index];
            this.flag[i] = flag;
            this.palette[i] = flag & spriteFlag.palette1 ? this.pal1 : this.pal0;
        }
    }

    // Color index of column 0 - 7 of the i-th sprite.
    pixel(i: number, column: number): number {
        const bit = 7 - column;
        const data = this.data[i];

        return (((data >>> (bit + 8)) & 0x01) << 1) | ((data >>> bit) & 0x01);
    }

    length = 0;
    data = new Uint16Array(MAX_SPRITES_PER_LINE);
    positionX = new Int32Array(MAX_SPRITES_PER_LINE);
    flag = new Uint8Array(MAX_SPRITES_PER_LINE);
    palette = new Array<Palette>(MAX_SPRITES_PER_LINE);

    private sortBuffer = new Uint8Array(41);
    private positionXCache = new Int32Array(40);
    private positionYCache = new Int32Array(40);
}
