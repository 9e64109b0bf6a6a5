import { Bus, OPEN_BUS, ReadHandler, WriteHandler } from './bus';
import { FrameBuffer, SCREEN_WIDTH } from './ppu/frame-buffer';
import { Interrupt, irq } from './interrupt';
import { PALETTE_CLASSIC, Palette } from './palette';
import { SpriteQueue, spriteFlag } from './ppu/sprite-queue';

import { hex8, signed8 } from '../helper/format';

const enum reg {
    base = 0xff40,
    lcdc = 0x00,
    stat = 0x01,
    scy = 0x02,
    scx = 0x03,
    ly = 0x04,
    lyc = 0x05,
    dma = 0x06,
    bgp = 0x07,
    obp0 = 0x08,
    obp1 = 0x09,
    wy = 0x0a,
    wx = 0x0b,
}

export const enum ppuMode {
    hblank = 0,
    vblank = 1,
    oamScan = 2,
    draw = 3,
}

export const enum lcdc {
    enable = 0x80,
    windowTileMapArea = 0x40,
    windowEnable = 0x20,
    bgTileDataArea = 0x10,
    bgTileMapArea = 0x08,
    objSize = 0x04,
    objEnable = 0x02,
    bgEnable = 0x01,
}

export const enum stat {
    sourceLY = 0x40,
    sourceModeOAM = 0x20,
    sourceModeVblank = 0x10,
    sourceModeHblank = 0x08,
    coincidence = 0x04,
}

// Mode lengths in dots. Pixel transfer has a fixed length, sprite and scroll stalls are not modelled.
export const enum modeCycles {
    oamScan = 80,
    draw = 172,
    hblank = 204,
    line = 456,
}

export const VISIBLE_LINES = 144;
export const TOTAL_LINES = 154;
export const CYCLES_PER_FRAME = modeCycles.line * TOTAL_LINES;

export class Ppu {
    constructor(private bus: Bus, private interrupt: Interrupt) {}

    install(bus: Bus): void {
        bus.mapRange(0x8000, 0x9fff, this.vramRead, this.vramWrite);
        bus.mapRange(0xfe00, 0xfe9f, this.oamRead, this.oamWrite);

        for (let i = 0; i <= reg.wx; i++) {
            bus.map(reg.base + i, this.registerRead, this.registerWrite);
        }

        bus.map(reg.base + reg.lcdc, this.registerRead, this.lcdcWrite);
        bus.map(reg.base + reg.stat, this.statRead, this.statWrite);
        bus.map(reg.base + reg.ly, this.lyRead, this.stubWrite);
        bus.map(reg.base + reg.lyc, this.registerRead, this.lycWrite);
        bus.map(reg.base + reg.dma, this.registerRead, this.dmaWrite);
        bus.map(reg.base + reg.bgp, this.registerRead, this.bgpWrite);
        bus.map(reg.base + reg.obp0, this.registerRead, this.obp0Write);
        bus.map(reg.base + reg.obp1, this.registerRead, this.obp1Write);
    }

    reset(): void {
        this.vram.fill(0);
        this.oam.fill(0);
        this.reg.fill(0);

        this.reg[reg.lcdc] = lcdc.enable | lcdc.bgTileDataArea | lcdc.bgEnable;
        this.reg[reg.bgp] = 0xfc;
        this.reg[reg.obp0] = 0xff;
        this.reg[reg.obp1] = 0xff;
        this.updatePalettes();

        this.frameBuffer.reset(this.palette[4]);

        this.startFrame();
    }

    /**
     * Spend up to `budget` dots in the current mode and return the number of dots actually consumed. Nothing
     * observable happens until the mode runs out; the transition and all its side effects then happen at once.
     */
    run(budget: number): number {
        if (budget <= 0) return 0;

        const consumed = budget < this.cyclesRemaining ? budget : this.cyclesRemaining;
        this.cyclesRemaining -= consumed;

        if (this.cyclesRemaining === 0) {
            if (this.lcdEnabled()) this.advanceMode();
            else this.publishBlankFrame();
        }

        return consumed;
    }

    // Last completed frame, 160x144 ABGR pixels.
    getFrame(): Uint32Array {
        return this.frameBuffer.getFront();
    }

    // A frame was completed since the last call.
    frameReady(): boolean {
        return this.frameBuffer.consumeReady();
    }

    getFrameIndex(): number {
        return this.frameBuffer.getFrameIndex();
    }

    getMode(): ppuMode {
        return this.mode;
    }

    getLine(): number {
        return this.scanline;
    }

    getCyclesRemaining(): number {
        return this.cyclesRemaining;
    }

    setPalette(palette: Palette): void {
        this.palette = palette;
        this.updatePalettes();
    }

    printState(): string {
        return `scanline=${this.scanline} mode=${this.mode} remaining=${this.cyclesRemaining} frame=${this.getFrameIndex()} lcdc=${hex8(
            this.reg[reg.lcdc]
        )} stat=${hex8(this.statRead(reg.base + reg.stat))}`;
    }

    private advanceMode(): void {
        switch (this.mode) {
            case ppuMode.oamScan:
                this.enterMode(ppuMode.draw, modeCycles.draw);
                break;

            case ppuMode.draw:
                this.renderLine();
                this.enterMode(ppuMode.hblank, modeCycles.hblank);

                if (this.reg[reg.stat] & stat.sourceModeHblank) this.interrupt.raise(irq.stat);
                break;

            case ppuMode.hblank:
                this.setScanline(this.scanline + 1);

                if (this.scanline === VISIBLE_LINES) {
                    this.enterMode(ppuMode.vblank, modeCycles.line);

                    this.interrupt.raise(irq.vblank);
                    if (this.reg[reg.stat] & stat.sourceModeVblank) this.interrupt.raise(irq.stat);

                    this.frameBuffer.swap();
                } else {
                    this.enterOamScan();
                }
                break;

            case ppuMode.vblank:
                if (this.scanline + 1 === TOTAL_LINES) {
                    this.startFrame();
                    this.setScanline(0);
                    this.enterOamScan();
                } else {
                    this.setScanline(this.scanline + 1);
                    this.cyclesRemaining = modeCycles.line;
                }
                break;
        }
    }

    private enterMode(mode: ppuMode, cycles: number): void {
        this.mode = mode;
        this.cyclesRemaining = cycles;
    }

    private enterOamScan(): void {
        this.enterMode(ppuMode.oamScan, modeCycles.oamScan);

        if (this.reg[reg.stat] & stat.sourceModeOAM) this.interrupt.raise(irq.stat);
    }

    private setScanline(scanline: number): void {
        this.scanline = scanline;

        if (this.scanline === this.reg[reg.lyc] && this.reg[reg.stat] & stat.sourceLY) this.interrupt.raise(irq.stat);
    }

    private startFrame(): void {
        this.mode = ppuMode.oamScan;
        this.cyclesRemaining = modeCycles.oamScan;
        this.scanline = 0;
        this.windowTriggered = false;
        this.windowLine = 0;
    }

    // The LCD is off: keep delivering blank frames at the regular rate so that frame pacing continues.
    private publishBlankFrame(): void {
        this.frameBuffer.getBack().fill(this.palette[4]);
        this.frameBuffer.swap();

        this.cyclesRemaining = CYCLES_PER_FRAME;
    }

    private renderLine(): void {
        const control = this.reg[reg.lcdc];
        const backBuffer = this.frameBuffer.getBack();
        const rowBase = SCREEN_WIDTH * this.scanline;

        if (this.scanline === this.reg[reg.wy]) this.windowTriggered = true;

        const bgEnabled = (control & lcdc.bgEnable) !== 0;
        const windowX = this.reg[reg.wx] - 7;
        const windowVisible = bgEnabled && (control & lcdc.windowEnable) !== 0 && this.windowTriggered && windowX < SCREEN_WIDTH;

        const backgroundX = this.reg[reg.scx];
        const backgroundY = (this.reg[reg.scy] + this.scanline) & 0xff;

        for (let x = 0; x < SCREEN_WIDTH; x++) {
            let color = 0;

            if (windowVisible && x >= windowX) {
                color = this.tilePixel((control & lcdc.windowTileMapArea) !== 0, x - windowX, this.windowLine);
            } else if (bgEnabled) {
                color = this.tilePixel((control & lcdc.bgTileMapArea) !== 0, (backgroundX + x) & 0xff, backgroundY);
            }

            this.lineColors[x] = color;
            // with BG and window off the line is plain shade 0, BGP does not apply
            backBuffer[rowBase + x] = bgEnabled ? this.paletteBG[color] : this.palette[0];
        }

        if (windowVisible) this.windowLine++;

        if (control & lcdc.objEnable) this.renderSprites(backBuffer, rowBase, (control & lcdc.objSize) !== 0);
    }

    private renderSprites(backBuffer: Uint32Array, rowBase: number, dblHeight: boolean): void {
        const queue = this.spriteQueue;

        queue.initialize(this.scanline, dblHeight);
        if (queue.length === 0) return;

        for (let x = 0; x < SCREEN_WIDTH; x++) {
            for (let i = 0; i < queue.length; i++) {
                const column = x - queue.positionX[i];
                if (column < 0 || column > 7) continue;

                const color = queue.pixel(i, column);
                if (color === 0) continue;

                // the first opaque sprite decides the pixel, even if it is hidden behind the background
                if ((queue.flag[i] & spriteFlag.behindBackground) === 0 || this.lineColors[x] === 0) {
                    backBuffer[rowBase + x] = queue.palette[i][color];
                }

                break;
            }
        }
    }

    // Color index of pixel (x, y) in the 256x256 tile map.
    private tilePixel(highMap: boolean, x: number, y: number): number {
        const tileIndex = this.vram[(highMap ? 0x1c00 : 0x1800) + ((y >>> 3) << 5) + (x >>> 3)];
        const tileBase = this.reg[reg.lcdc] & lcdc.bgTileDataArea ? tileIndex << 4 : 0x1000 + (signed8(tileIndex) << 4);
        const address = tileBase + ((y & 0x07) << 1);
        const bit = 7 - (x & 0x07);

        return (((this.vram[address + 1] >>> bit) & 0x01) << 1) | ((this.vram[address] >>> bit) & 0x01);
    }

    private updatePalettes(): void {
        this.updatePalette(this.paletteBG, this.reg[reg.bgp]);
        this.updatePalette(this.paletteOB0, this.reg[reg.obp0]);
        this.updatePalette(this.paletteOB1, this.reg[reg.obp1]);
    }

    private updatePalette(target: Uint32Array, palette: number): void {
        for (let i = 0; i < 4; i++) {
            target[i] = this.palette[(palette >> (2 * i)) & 0x03];
        }
    }

    private lcdEnabled(): boolean {
        return (this.reg[reg.lcdc] & lcdc.enable) !== 0;
    }

    private vramAccessible(): boolean {
        return !this.lcdEnabled() || this.mode !== ppuMode.draw;
    }

    private oamAccessible(): boolean {
        return !this.lcdEnabled() || (this.mode !== ppuMode.draw && this.mode !== ppuMode.oamScan);
    }

    private stubWrite: WriteHandler = () => undefined;

    private vramRead: ReadHandler = (address) => (this.vramAccessible() ? this.vram[address & 0x1fff] : OPEN_BUS);
    private vramWrite: WriteHandler = (address, value) => {
        if (this.vramAccessible()) this.vram[address & 0x1fff] = value;
    };

    private oamRead: ReadHandler = (address) => (this.oamAccessible() ? this.oam[address - 0xfe00] : OPEN_BUS);
    private oamWrite: WriteHandler = (address, value) => {
        if (this.oamAccessible()) this.oam[address - 0xfe00] = value;
    };

    private registerRead: ReadHandler = (address) => this.reg[address - reg.base];
    private registerWrite: WriteHandler = (address, value) => (this.reg[address - reg.base] = value);

    private statRead: ReadHandler = () =>
        0x80 |
        (this.reg[reg.stat] & 0x78) |
        (this.reg[reg.lyc] === this.scanline ? stat.coincidence : 0) |
        (this.lcdEnabled() ? this.mode : ppuMode.hblank);
    private statWrite: WriteHandler = (_, value) => (this.reg[reg.stat] = value & 0x78);

    private lyRead: ReadHandler = () => this.scanline;

    private lycWrite: WriteHandler = (_, value) => {
        this.reg[reg.lyc] = value;

        if (this.lcdEnabled() && value === this.scanline && this.reg[reg.stat] & stat.sourceLY) this.interrupt.raise(irq.stat);
    };

    // OAM DMA completes instantly instead of blocking the bus for 160 M-cycles.
    private dmaWrite: WriteHandler = (_, value) => {
        this.reg[reg.dma] = value;

        const base = (value >= 0xe0 ? value - 0x20 : value) << 8;

        // VRAM is read past the mode 3 lock
        for (let i = 0; i < this.oam.length; i++) {
            const address = base + i;
            this.oam[i] = address >= 0x8000 && address < 0xa000 ? this.vram[address - 0x8000] : this.bus.read(address);
        }
    };

    private bgpWrite: WriteHandler = (_, value) => {
        this.reg[reg.bgp] = value;
        this.updatePalette(this.paletteBG, value);
    };

    private obp0Write: WriteHandler = (_, value) => {
        this.reg[reg.obp0] = value;
        this.updatePalette(this.paletteOB0, value);
    };

    private obp1Write: WriteHandler = (_, value) => {
        this.reg[reg.obp1] = value;
        this.updatePalette(this.paletteOB1, value);
    };

    private lcdcWrite: WriteHandler = (_, value) => {
        const oldValue = this.reg[reg.lcdc];
        this.reg[reg.lcdc] = value;

        if (~oldValue & value & lcdc.enable) {
            this.startFrame();
        }

        if (oldValue & ~value & lcdc.enable) {
            this.scanline = 0;
            this.mode = ppuMode.hblank;
            this.publishBlankFrame();
        }
    };

    private cyclesRemaining: number = modeCycles.oamScan;
    private scanline = 0;
    private mode: ppuMode = ppuMode.oamScan;

    private windowTriggered = false;
    private windowLine = 0;

    private vram = new Uint8Array(0x2000);
    private oam = new Uint8Array(0xa0);
    private reg = new Uint8Array(reg.wx + 1);

    private palette: Palette = PALETTE_CLASSIC;
    private paletteBG = new Uint32Array(4);
    private paletteOB0 = new Uint32Array(4);
    private paletteOB1 = new Uint32Array(4);

    private lineColors = new Uint8Array(SCREEN_WIDTH);

    private frameBuffer = new FrameBuffer(PALETTE_CLASSIC[4]);
    private spriteQueue = new SpriteQueue(this.vram, this.oam, this.paletteOB0, this.paletteOB1);
}
