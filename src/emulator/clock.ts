import { Serial } from './serial';
import { Timer } from './timer';

// Distributes elapsed CPU time to the peripherals that run off the CPU clock.
export class Clock {
    constructor(private timer: Timer, private serial: Serial) {}

    increment(cpuCycles: number): void {
        this.timer.cycle(cpuCycles);
        this.serial.cycle(cpuCycles);
    }
}
