/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

import { assert } from '@fluidframework/common-utils';

/**
 * Number of digits covered by the check digit of an identity number. Century digits above this window are ignored.
 */
const luhnPayloadDigits = 9;
const luhnPayloadModulus = 10 ** luhnPayloadDigits;

/**
 * Computes the Luhn (modulus 10) check digit for a payload of up to 9 digits.
 *
 * Starting at the least significant digit every other digit is doubled, and doubled values of 10 or more contribute
 * the sum of their two digits.
 * @returns the digit that makes `payload` followed by it a Luhn-valid sequence.
 */
export function computeLuhnCheckDigit(payload: number): number {
	assert(Number.isSafeInteger(payload) && payload >= 0, 'Luhn payload must be a non-negative integer');
	let sum = 0;
	let double = true;
	for (let remaining = payload; remaining !== 0; remaining = Math.floor(remaining / 10)) {
		const digit = remaining % 10;
		const value = double ? digit * 2 : digit;
		sum += (value % 10) + Math.floor(value / 10);
		double = !double;
	}
	return (10 - (sum % 10)) % 10;
}

/**
 * @returns the check digit of the 9 digits before the last digit of `identityNumber`.
 */
export function expectedCheckDigit(identityNumber: number): number {
	return computeLuhnCheckDigit(Math.floor(identityNumber / 10) % luhnPayloadModulus);
}

/**
 * @returns true if the last digit of `identityNumber` is the check digit of the 9 digits before it.
 */
export function hasValidCheckDigit(identityNumber: number): boolean {
	return identityNumber % 10 === expectedCheckDigit(identityNumber);
}
