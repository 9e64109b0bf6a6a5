import { CartridgeAddress, CartridgeROMBankSize, CartridgeType, romSizeFromHeader } from './cartridges/CartridgeBase';
import { hex16, hex8 } from '../helper/format';

import { Bus } from './bus';
import { CartridgeMbc1 } from './cartridges/CartridgeMbc1';
import { CartridgeRom } from './cartridges/CartridgeRom';
import { System } from './system';

export interface Cartridge {
    install(bus: Bus): void;
    reset(): void;
    type(): number;
    size(): number;
    title(): string;
    printInfo(): string;
    printState(): string;
}

/**
 * Validate a cartridge image and build the matching mapper. Broken images and mappers that are not
 * emulated are rejected with an error, checksum mismatches are only reported.
 */
export function createCartridge(image: Uint8Array, system: System): Cartridge {
    if (image.length < 0x8000 || image.length % CartridgeROMBankSize !== 0) {
        throw new Error(`bad ROM file size ${hex16(image.length)}`);
    }

    const lengthReference = romSizeFromHeader(image);
    if (image.length !== lengthReference) {
        throw new Error(`ROM size mismatch: expected ${lengthReference} bytes, got ${image.length}`);
    }

    const headerChecksumReference = image[CartridgeAddress.headerChecksum];
    const headerChecksum = calculateHeaderChecksum(image);

    if (headerChecksum !== headerChecksumReference) {
        system.warning(`ROM header checksum mismatch: expected ${hex8(headerChecksumReference)}, got ${hex8(headerChecksum)}`);
    }

    const checksumReference = (image[CartridgeAddress.globalChecksumHigh] << 8) | image[CartridgeAddress.globalChecksumLow];
    const checksum = calculateGlobalChecksum(image);

    if (checksum !== checksumReference) {
        system.warning(`ROM checksum mismatch: expected ${hex16(checksumReference)}, got ${hex16(checksum)}`);
    }

    const type = image[CartridgeAddress.type];
    switch (type) {
        case CartridgeType.rom:
        case CartridgeType.rom_ram:
        case CartridgeType.rom_ram_battery:
            return new CartridgeRom(image, system);

        case CartridgeType.mbc1:
        case CartridgeType.mbc1_ram:
        case CartridgeType.mbc1_ram_battery:
            return new CartridgeMbc1(image, system);

        default:
            throw new Error(`unsupported cartridge type ${hex8(type)}`);
    }
}

export function calculateHeaderChecksum(image: Uint8Array): number {
    let checksum = 0;
    for (let i = CartridgeAddress.titleStart; i < CartridgeAddress.headerChecksum; i++) checksum = checksum - image[i] - 1;

    return checksum & 0xff;
}

export function calculateGlobalChecksum(image: Uint8Array): number {
    let checksum = 0;

    for (let i = 0; i < image.length; i++) {
        if (i !== CartridgeAddress.globalChecksumHigh && i !== CartridgeAddress.globalChecksumLow) checksum = (checksum + image[i]) & 0xffff;
    }

    return checksum;
}
