import { BumpWord } from '../pipeline/layout';

export function readBumpWord(bump: DataView, word: number): number {
  return bump.getUint32(word * 4, true);
}

export function writeBumpWord(bump: DataView, word: number, value: number): void {
  bump.setUint32(word * 4, value, true);
}

export function raiseFailure(bump: DataView, flag: number): void {
  writeBumpWord(bump, BumpWord.failed, readBumpWord(bump, BumpWord.failed) | flag);
}

export function failureFlags(bump: DataView): number {
  return readBumpWord(bump, BumpWord.failed);
}
