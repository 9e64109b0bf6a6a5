export function hex8(value: number): string {
    return `0x${(value & 0xff).toString(16).padStart(2, '0')}`;
}

export function hex16(value: number): string {
    return `0x${(value & 0xffff).toString(16).padStart(4, '0')}`;
}

// Interpret an operand byte as two's complement.
export function signed8(value: number): number {
    return value & 0x80 ? (value & 0xff) - 0x100 : value & 0xff;
}

export function signedHex8(value: number): string {
    const signedValue = signed8(value);

    return `${signedValue < 0 ? '-' : ''}${hex8(Math.abs(signedValue))}`;
}
