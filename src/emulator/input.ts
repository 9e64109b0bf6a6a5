import { ALL_KEYS, Joypad, key } from './joypad';

export interface InputSource {
    // Snapshot of the keys this source currently holds down.
    poll(): ReadonlySet<key>;
}

// Merges any number of input sources into the joypad. A key is down while any source reports it.
export class InputBridge {
    constructor(private joypad: Joypad) {}

    addSource(source: InputSource): void {
        if (!this.sources.includes(source)) this.sources.push(source);
    }

    removeSource(source: InputSource): void {
        this.sources = this.sources.filter((s) => s !== source);
    }

    poll(): void {
        const pressed = new Set<key>();
        this.sources.forEach((source) => source.poll().forEach((k) => pressed.add(k)));

        for (const k of ALL_KEYS) {
            const isDown = pressed.has(k);
            if (isDown === this.joypad.isDown(k)) continue;

            if (isDown) this.joypad.down(k);
            else this.joypad.up(k);
        }
    }

    private sources: Array<InputSource> = [];
}

// Input source driven by explicit calls, used for scripted input.
export class ManualInput implements InputSource {
    press(k: key): void {
        this.keys.add(k);
    }

    release(k: key): void {
        this.keys.delete(k);
    }

    poll(): ReadonlySet<key> {
        return this.keys;
    }

    private keys = new Set<key>();
}
