// Ring buffer of the last executed instruction addresses, oldest first.
export class Trace {
    constructor(private capacity = 30) {
        this.addresses = new Uint16Array(capacity);
    }

    add(address: number): void {
        this.addresses[this.head] = address;
        this.head = (this.head + 1) % this.capacity;

        if (this.length < this.capacity) this.length++;
    }

    entries(count = this.length): Array<number> {
        const n = Math.min(count, this.length);
        const result = new Array<number>(n);

        for (let i = 0; i < n; i++) {
            result[i] = this.addresses[(this.head - n + i + this.capacity) % this.capacity];
        }

        return result;
    }

    reset(): void {
        this.length = 0;
        this.head = 0;
    }

    private readonly addresses: Uint16Array;

    private length = 0;
    private head = 0;
}
