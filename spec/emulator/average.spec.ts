import { Average } from '../../src/emulator/average';
import { Trace } from '../../src/emulator/trace';

describe('Average', () => {
    it('is zero without samples', () => {
        expect(new Average(4).calculateAverage()).toBe(0);
    });

    it('averages over the samples seen so far', () => {
        const average = new Average(4);

        average.push(2);
        average.push(4);

        expect(average.calculateAverage()).toBe(3);
    });

    it('forgets the oldest samples', () => {
        const average = new Average(2);

        average.push(100);
        average.push(2);
        average.push(4);

        expect(average.calculateAverage()).toBe(3);

        average.reset();
        expect(average.calculateAverage()).toBe(0);
    });
});

describe('Trace', () => {
    it('returns the most recent entries oldest first', () => {
        const trace = new Trace(3);

        [0x100, 0x101, 0x104, 0x150].forEach((address) => trace.add(address));

        expect(trace.entries()).toEqual([0x101, 0x104, 0x150]);
        expect(trace.entries(2)).toEqual([0x104, 0x150]);
        expect(trace.entries(10)).toEqual([0x101, 0x104, 0x150]);
    });

    it('is empty after reset', () => {
        const trace = new Trace(3);

        trace.add(0x100);
        trace.reset();

        expect(trace.entries()).toEqual([]);
    });
});
