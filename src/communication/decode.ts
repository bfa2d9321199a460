import { DecodeError } from './errors';

export const REAL_SIZE = 4;

/** S7 stores REAL values as big-endian IEEE-754 singles. */
export function decodeReal(data: Buffer): number {
    if (data.length !== REAL_SIZE) {
        throw new DecodeError(REAL_SIZE, data.length);
    }
    return data.readFloatBE(0);
}
