import { AddressingMode } from '../../src/emulator/instruction';
import { Bus } from '../../src/emulator/bus';
import { Clock } from '../../src/emulator/clock';
import { Cpu } from '../../src/emulator/cpu';
import { Interrupt } from '../../src/emulator/interrupt';
import { System } from '../../src/emulator/system';
import { TestEnvironment } from './test_environment';

export interface Environment {
    bus: Bus;
    cpu: Cpu;
    system: System;
    clock: Clock;
    interrupt: Interrupt;
    cartridge: Uint8Array;
    log: Array<string>;
    env: TestEnvironment;
}

export function newEnvironment(code: ArrayLike<number>, address = 0x100): Environment {
    const env = new TestEnvironment(code, address);

    return {
        bus: env.bus,
        cpu: env.cpu,
        system: env.system,
        clock: env.clock,
        interrupt: env.interrupt,
        cartridge: env.cartridge,
        log: env.log,
        env,
    };
}

// Operand bytes that follow the opcode for an addressing mode.
export function lengthFromMode(mode: AddressingMode): number {
    switch (mode) {
        case AddressingMode.imm8:
        case AddressingMode.imm8sign:
        case AddressingMode.imm8io:
            return 1;

        case AddressingMode.imm16:
        case AddressingMode.imm16ind8:
        case AddressingMode.imm16ind16:
            return 2;

        default:
            return 0;
    }
}
