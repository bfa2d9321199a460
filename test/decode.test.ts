import { describe, expect, it } from 'vitest';
import { decodeReal } from '../src/communication/decode';
import { DecodeError } from '../src/communication/errors';
import { bytes } from './helpers';

describe('decodeReal', () => {
    it('decodes big-endian IEEE-754 singles', () => {
        expect(decodeReal(bytes(0x43, 0x48, 0x00, 0x00))).toBe(200);
        expect(decodeReal(bytes(0x42, 0xc8, 0x00, 0x00))).toBe(100);
        expect(decodeReal(bytes(0x00, 0x00, 0x00, 0x00))).toBe(0);
        expect(decodeReal(bytes(0xc2, 0xc8, 0x00, 0x00))).toBe(-100);
        expect(decodeReal(bytes(0x3f, 0x80, 0x00, 0x00))).toBe(1);
    });

    it('keeps single precision exactly', () => {
        expect(decodeReal(bytes(0x3d, 0xcc, 0xcc, 0xcd))).toBe(Math.fround(0.1));
        expect(decodeReal(bytes(0x7f, 0x80, 0x00, 0x00))).toBe(Infinity);
    });

    it('is deterministic for the same bytes', () => {
        const data = bytes(0x44, 0x7a, 0x10, 0x00);
        expect(decodeReal(data)).toBe(decodeReal(Buffer.from(data)));
        expect(decodeReal(data)).toBe(1000.25);
    });

    it('rejects anything but four bytes', () => {
        expect(() => decodeReal(bytes(0x42, 0xc8, 0x00))).toThrow(DecodeError);
        expect(() => decodeReal(bytes(0x42, 0xc8, 0x00, 0x00, 0x00))).toThrow('Cannot decode 5 bytes as a 4 byte value');
    });
});
