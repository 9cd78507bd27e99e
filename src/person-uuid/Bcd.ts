/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

import { assert } from '@fluidframework/common-utils';
import { PersonUuidError, PersonUuidErrorType } from '../Common';

/**
 * Binary coded decimal packing of decimal digits into the nibbles of a 64 bit word:
 * ```
 * value 5568099963, 12 digits -> 0x005568099963
 *                                  ^          ^
 *                        nibble 11          nibble 0
 * ```
 * Each nibble holds one decimal digit, so the hex text of the word reads as the decimal value.
 */

const bitsPerDigit = 4n;
const nibbleMask = 0xfn;
const maxDigitsPerWord = 16;

function assertValidDigitCount(digitCount: number): void {
	assert(
		Number.isInteger(digitCount) && digitCount >= 0 && digitCount <= maxDigitsPerWord,
		'digit count must fit in a 64 bit word'
	);
}

/**
 * Packs the `digitCount` least significant decimal digits of `value` into a word, the least significant digit in the
 * lowest nibble. Digits above `digitCount` are dropped.
 */
export function encodeBcdDigits(value: number, digitCount: number): bigint {
	assertValidDigitCount(digitCount);
	assert(Number.isSafeInteger(value) && value >= 0, 'BCD value must be a non-negative safe integer');
	let word = 0n;
	let remaining = value;
	for (let i = 0; i < digitCount && remaining !== 0; i++) {
		word |= BigInt(remaining % 10) << (BigInt(i) * bitsPerDigit);
		remaining = Math.floor(remaining / 10);
	}
	return word;
}

/**
 * Reads the `digitCount` lowest nibbles of `word` as decimal digits, most significant first.
 * @returns the decimal value
 * @throws {@link PersonUuidError} with `NonConformantBinary` if a nibble is not a decimal digit.
 */
export function decodeBcdDigits(word: bigint, digitCount: number): number {
	assertValidDigitCount(digitCount);
	let result = 0;
	for (let i = digitCount - 1; i >= 0; i--) {
		const digit = Number((word >> (BigInt(i) * bitsPerDigit)) & nibbleMask);
		if (digit > 9) {
			throw new PersonUuidError(
				PersonUuidErrorType.NonConformantBinary,
				`Nibble ${i} of ${word.toString(16)} is not a decimal digit`
			);
		}
		result = result * 10 + digit;
	}
	return result;
}
