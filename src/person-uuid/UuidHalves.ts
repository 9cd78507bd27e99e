/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

import { assert } from '@fluidframework/common-utils';
import { parse, stringify, validate } from 'uuid';
import { PersonUuidError, PersonUuidErrorType } from '../Common';
import type { UuidString } from '../Identifiers';

/**
 * A 128 bit UUID as two unsigned 64 bit halves:
 * ```
 * xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx
 * \_____high_______/ \______low______/
 * ```
 * @public
 */
export interface UuidHalves {
	readonly high: bigint;
	readonly low: bigint;
}

const bytesPerHalf = 8;
const uuidByteLength = 16;
const maxHalf = 0xffffffffffffffffn;
const uuidShape = /^[\da-f]{8}-[\da-f]{4}-[\da-f]{4}-[\da-f]{4}-[\da-f]{12}$/i;

/**
 * @returns true if `text` has the 8-4-4-4-12 hex digit shape of a UUID, in either case. The value itself is not
 * checked.
 */
export function isUuidString(text: string): boolean {
	return uuidShape.test(text);
}

function readHalf(bytes: ArrayLike<number>, offset: number): bigint {
	let half = 0n;
	for (let i = offset; i < offset + bytesPerHalf; i++) {
		half = (half << 8n) | BigInt(bytes[i]);
	}
	return half;
}

function writeHalf(bytes: Uint8Array, offset: number, half: bigint): void {
	let remaining = half;
	for (let i = offset + bytesPerHalf - 1; i >= offset; i--) {
		bytes[i] = Number(remaining & 0xffn);
		remaining >>= 8n;
	}
}

function isByte(value: number): boolean {
	return Number.isInteger(value) && value >= 0 && value <= 0xff;
}

/**
 * Reads the 16 byte big-endian binary form of a UUID.
 * @throws {@link PersonUuidError} with `NonConformantBinary` if `bytes` is not 16 integers in 0..255.
 */
export function uuidHalvesFromBytes(bytes: ArrayLike<number>): UuidHalves {
	if (bytes.length !== uuidByteLength) {
		throw new PersonUuidError(
			PersonUuidErrorType.NonConformantBinary,
			`A UUID is ${uuidByteLength} bytes, got ${bytes.length}`
		);
	}
	for (let i = 0; i < uuidByteLength; i++) {
		if (!isByte(bytes[i])) {
			throw new PersonUuidError(PersonUuidErrorType.NonConformantBinary, `Invalid UUID byte at ${i}: ${bytes[i]}`);
		}
	}
	return { high: readHalf(bytes, 0), low: readHalf(bytes, bytesPerHalf) };
}

/**
 * Writes the 16 byte big-endian binary form of a UUID.
 */
export function uuidBytesFromHalves({ high, low }: UuidHalves): Uint8Array {
	assert(high >= 0n && high <= maxHalf && low >= 0n && low <= maxHalf, 'UUID halves must be unsigned 64 bit values');
	const bytes = new Uint8Array(uuidByteLength);
	writeHalf(bytes, 0, high);
	writeHalf(bytes, bytesPerHalf, low);
	return bytes;
}

/**
 * Reads a UUID from its canonical text form.
 * @throws {@link PersonUuidError} with `UnparsableText` if `text` is not UUID shaped, or `NonConformantBinary` if it
 * is not an RFC 4122 UUID.
 */
export function uuidHalvesFromString(text: string): UuidHalves {
	if (!isUuidString(text)) {
		throw new PersonUuidError(PersonUuidErrorType.UnparsableText, `${text} is not a uuid.`);
	}
	if (!validate(text)) {
		throw new PersonUuidError(PersonUuidErrorType.NonConformantBinary, `${text} is not an RFC 4122 uuid.`);
	}
	return uuidHalvesFromBytes(parse(text));
}

/**
 * @returns the canonical lowercase text form of the UUID.
 */
export function uuidStringFromHalves(halves: UuidHalves): UuidString {
	return stringify(uuidBytesFromHalves(halves)) as UuidString;
}
