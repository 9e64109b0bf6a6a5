export const SCREEN_WIDTH = 160;
export const SCREEN_HEIGHT = 144;

/**
 * Two 160x144 pixel buffers that swap roles at the end of every frame. The front buffer always holds the
 * last completed frame, the PPU draws into the back buffer.
 */
export class FrameBuffer {
    constructor(fill: number) {
        this.reset(fill);
    }

    reset(fill: number): void {
        this.frontBuffer.fill(fill);
        this.backBuffer.fill(fill);

        this.frameIndex = 0;
        this.ready = false;
    }

    getFront(): Uint32Array {
        return this.frontBuffer;
    }

    getBack(): Uint32Array {
        return this.backBuffer;
    }

    getFrameIndex(): number {
        return this.frameIndex;
    }

    swap(): void {
        const frontBuffer = this.frontBuffer;

        this.frontBuffer = this.backBuffer;
        this.backBuffer = frontBuffer;

        this.frameIndex = (this.frameIndex + 1) | 0;
        this.ready = true;
    }

    // True once per swap.
    consumeReady(): boolean {
        const ready = this.ready;
        this.ready = false;

        return ready;
    }

    private frontBuffer = new Uint32Array(SCREEN_WIDTH * SCREEN_HEIGHT);
    private backBuffer = new Uint32Array(SCREEN_WIDTH * SCREEN_HEIGHT);

    private frameIndex = 0;
    private ready = false;
}
