// Moving average over the last `samples` values.
export class Average {
    constructor(private samples: number) {
        this.buffer = new Float64Array(samples);
    }

    push(value: number): void {
        this.sum += value - this.buffer[this.next];
        this.buffer[this.next] = value;

        this.next = (this.next + 1) % this.samples;
        if (this.count < this.samples) this.count++;
    }

    calculateAverage(): number {
        return this.count === 0 ? 0 : this.sum / this.count;
    }

    reset(): void {
        this.buffer.fill(0);
        this.sum = 0;
        this.next = 0;
        this.count = 0;
    }

    private readonly buffer: Float64Array;

    private sum = 0;
    private next = 0;
    private count = 0;
}
