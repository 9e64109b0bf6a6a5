import { Bus, OPEN_BUS, ReadHandler, WriteHandler } from '../bus';
import { CartridgeBase, CartridgeRAMBankSize, CartridgeROMBankSize } from './CartridgeBase';

import { System } from '../system';
import { hex8 } from '../../helper/format';

export class CartridgeMbc1 extends CartridgeBase {
    constructor(image: Uint8Array, system: System) {
        super(image, system);

        this.romBanks = Math.max((image.length / CartridgeROMBankSize) | 0, 1);
        this.ramBanks = Math.max((this.ram.length / CartridgeRAMBankSize) | 0, 1);

        this.updateBanks();
    }

    install(bus: Bus): void {
        bus.mapRange(0x0000, 0x1fff, this.readBank0, this.writeRamEnable);
        bus.mapRange(0x2000, 0x3fff, this.readBank0, this.writeReg0);
        bus.mapRange(0x4000, 0x5fff, this.readBank1, this.writeReg1);
        bus.mapRange(0x6000, 0x7fff, this.readBank1, this.writeMode);
        bus.mapRange(0xa000, 0xbfff, this.readBankRam, this.writeBankRam);
    }

    reset(): void {
        super.reset();

        this.mode = 0;
        this.reg0 = 0;
        this.reg1 = 0;
        this.ramEnable = false;

        this.updateBanks();
    }

    printState(): string {
        return `rom0=${hex8(this.bankIndex0)} rom1=${hex8(this.bankIndex1)} ram=${this.ramEnable ? hex8(this.bankIndexRam) : 'disabled'} reg0=${hex8(
            this.reg0
        )} reg1=${hex8(this.reg1)} mode=${this.mode}`;
    }

    // reg0 selects the low five bits of the switchable bank, reg1 either the upper two bits of both ROM windows
    // (mode 1 on large ROMs) or the RAM bank (mode 1 on large RAMs).
    private updateBanks(): void {
        const largeRom = this.romBanks > 32;

        this.bankIndex0 = (this.mode === 1 && largeRom ? this.reg1 << 5 : 0) % this.romBanks;
        this.bankIndex1 = ((this.reg0 === 0 ? 1 : this.reg0) | (this.reg1 << 5)) % this.romBanks;
        this.bankIndexRam = (this.mode === 1 && !largeRom ? this.reg1 : 0) % this.ramBanks;
    }

    private readBank0: ReadHandler = (address) => this.image[this.bankIndex0 * CartridgeROMBankSize + address];
    private readBank1: ReadHandler = (address) => this.image[this.bankIndex1 * CartridgeROMBankSize + (address & 0x3fff)];

    private readBankRam: ReadHandler = (address) => {
        const offset = this.bankIndexRam * CartridgeRAMBankSize + address - 0xa000;

        return this.ramEnable && offset < this.ram.length ? this.ram[offset] : OPEN_BUS;
    };

    private writeBankRam: WriteHandler = (address, value) => {
        const offset = this.bankIndexRam * CartridgeRAMBankSize + address - 0xa000;

        if (this.ramEnable && offset < this.ram.length) this.ram[offset] = value;
    };

    private writeRamEnable: WriteHandler = (_, value) => {
        this.ramEnable = this.ram.length > 0 && (value & 0x0f) === 0x0a;
    };

    private writeReg0: WriteHandler = (_, value) => {
        this.reg0 = value & 0x1f;
        this.updateBanks();
    };

    private writeReg1: WriteHandler = (_, value) => {
        this.reg1 = value & 0x03;
        this.updateBanks();
    };

    private writeMode: WriteHandler = (_, value) => {
        this.mode = value & 0x01;
        this.updateBanks();
    };

    private readonly romBanks: number;
    private readonly ramBanks: number;

    private bankIndex0 = 0;
    private bankIndex1 = 1;
    private bankIndexRam = 0;

    private mode = 0;
    private reg0 = 0;
    private reg1 = 0;
    private ramEnable = false;
}
