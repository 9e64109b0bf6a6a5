import { Bus, WriteHandler } from '../bus';

import { Cartridge } from '../cartridge';
import { System } from '../system';
import { hex8 } from '../../helper/format';

export const enum CartridgeAddress {
    entryPoint = 0x100,
    titleStart = 0x134,
    titleEnd = 0x143,
    type = 0x147,
    size = 0x148,
    ramType = 0x149,
    headerChecksum = 0x14d,
    globalChecksumHigh = 0x14e,
    globalChecksumLow = 0x14f,
}

export const enum CartridgeType {
    rom = 0x00,
    mbc1 = 0x01,
    mbc1_ram = 0x02,
    mbc1_ram_battery = 0x03,
    rom_ram = 0x08,
    rom_ram_battery = 0x09,
}

export const CartridgeROMBankSize = 0x4000;
export const CartridgeRAMBankSize = 0x2000;

export function describeCartridgeType(type: number): string {
    switch (type) {
        case CartridgeType.rom:
            return 'ROM ONLY';

        case CartridgeType.mbc1:
            return 'MBC1';

        case CartridgeType.mbc1_ram:
            return 'MBC1+RAM';

        case CartridgeType.mbc1_ram_battery:
            return 'MBC1+RAM+BATTERY';

        case CartridgeType.rom_ram:
            return 'ROM+RAM';

        case CartridgeType.rom_ram_battery:
            return 'ROM+RAM+BATTERY';

        default:
            return `unsupported (${hex8(type)})`;
    }
}

// ROM size from the header: 32kb << n
export function romSizeFromHeader(image: Uint8Array): number {
    const code = image[CartridgeAddress.size];
    if (code > 0x08) throw new Error(`unknown ROM size code ${hex8(code)}`);

    return 0x8000 << code;
}

export function ramSizeFromHeader(image: Uint8Array): number {
    switch (image[CartridgeAddress.ramType]) {
        case 0x00:
            return 0;

        case 0x01:
            return 2 * 1024;

        case 0x02:
            return 8 * 1024;

        case 0x03:
            return 32 * 1024;

        case 0x04:
            return 128 * 1024;

        case 0x05:
            return 64 * 1024;

        default:
            throw new Error(`unknown RAM size code ${hex8(image[CartridgeAddress.ramType])}`);
    }
}

export function titleFromHeader(image: Uint8Array): string {
    let title = '';

    for (let i = CartridgeAddress.titleStart; i <= CartridgeAddress.titleEnd; i++) {
        const char = image[i];
        if (char === 0 || char >= 0x80) break;

        title += String.fromCharCode(char);
    }

    return title.trim();
}

export abstract class CartridgeBase implements Cartridge {
    constructor(protected image: Uint8Array, protected system: System) {
        this.ram = new Uint8Array(this.ramSize());
    }

    abstract install(bus: Bus): void;

    reset(): void {
        this.ram.fill(0);
    }

    type(): number {
        return this.image[CartridgeAddress.type];
    }

    size(): number {
        return romSizeFromHeader(this.image);
    }

    ramSize(): number {
        return ramSizeFromHeader(this.image);
    }

    title(): string {
        return titleFromHeader(this.image);
    }

    printInfo(): string {
        return `title="${this.title()}" type=${describeCartridgeType(this.type())}, size=${this.size() / 1024}kb, ram=${this.ramSize() / 1024}kb`;
    }

    abstract printState(): string;

    protected stubWrite: WriteHandler = () => undefined;

    protected readonly ram: Uint8Array;
}

