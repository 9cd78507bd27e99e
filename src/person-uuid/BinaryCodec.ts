/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

import { captureInputError, PersonUuidError, PersonUuidErrorType, Result } from '../Common';
import { decodeBcdDigits, encodeBcdDigits } from './Bcd';
import { type IdentityRecord, restoreIdentityRecord, validateIdentityRecord } from './IdentityRecord';
import type { UuidHalves } from './UuidHalves';

/**
 * Layout of a person UUID, a version 1 (date-time and MAC address) UUID whose fields are repurposed:
 * ```
 *                        ________________   _______________
 *                       /                \ /               \
 *                       xxxxxxxx-xxxx-Mxxx-Nxxx-xxxxxxxxxxxx
 *                       iiiiiiii-iiii-1sss-900t-d59a20d06c1a
 *                       \___________/ |\_/ |\/| \__________/
 *                             |       |  | | | |      |
 *  identity number, 1 digit   |       |  | | | |   fixed node id, multicast bit set
 *  per nibble (time_low/mid)  |       |  | | | |
 *                     version 1       |  | | | type code 0 to 3
 *                                     |  | | reserved, must be 0
 *       serial, 1 digit per nibble    /  | |
 *       (time_hi)                        | |
 *                     variant 10x with x=0, low bit of N set: N = 0b1001
 * ```
 * The identity number stays readable in the canonical hex text of the UUID.
 */

const identityDigits = 12;
const serialDigits = 3;
const identityShift = 16n;
const serialMask = 0xfffn;
const typeShift = 48n;
const typeMask = 0xfn;

const maxHalf = 0xffffffffffffffffn;
const highMask = 0x00000000_0000_f000n;
const highReserved = 0x00000000_0000_1000n;

/**
 * The node field of every person UUID, the MAC address d5:9a:20:d0:6c:1a. The multicast bit keeps it apart from
 * hardware addresses.
 */
export const personUuidNodeId = 0x0_00_0_d59a20d06c1an;

const lowMask = 0xf_ff_0_ffffffffffffn;
const lowReserved = 0x9_00_0_000000000000n | personUuidNodeId;

/**
 * @returns the 128 bits of the person UUID for `record`.
 * @throws {@link PersonUuidError} if `record` was not built by one of the record factories and holds a value a
 * factory would reject.
 */
export function encodeIdentityRecord(record: IdentityRecord): UuidHalves {
	validateIdentityRecord(record);
	const high =
		(encodeBcdDigits(record.number, identityDigits) << identityShift) |
		highReserved |
		encodeBcdDigits(record.serial, serialDigits);
	const low = lowReserved | (BigInt(record.type) << typeShift);
	return { high, low };
}

function isUnsignedHalf(half: bigint): boolean {
	return half >= 0n && half <= maxHalf;
}

function hasReservedBits({ high, low }: UuidHalves): boolean {
	return (
		isUnsignedHalf(high) &&
		isUnsignedHalf(low) &&
		(high & highMask) === highReserved &&
		(low & lowMask) === lowReserved
	);
}

/**
 * Reads the identity record stored in a person UUID.
 * @throws {@link PersonUuidError} with `NonConformantBinary` if the value does not follow the person UUID layout,
 * or with `ChecksumMismatch` if the stored identity number fails its check digit.
 */
export function decodeIdentityRecord(halves: UuidHalves): IdentityRecord {
	if (!hasReservedBits(halves)) {
		throw new PersonUuidError(
			PersonUuidErrorType.NonConformantBinary,
			`Invalid person UUID: ${halves.high.toString(16)}-${halves.low.toString(16)}`
		);
	}

	const identityNumber = decodeBcdDigits(halves.high >> identityShift, identityDigits);
	const serial = decodeBcdDigits(halves.high & serialMask, serialDigits);
	const typeCode = Number((halves.low >> typeShift) & typeMask);
	return restoreIdentityRecord(identityNumber, serial, typeCode);
}

/**
 * Non-throwing form of {@link decodeIdentityRecord}.
 */
export function tryDecodeIdentityRecord(halves: UuidHalves): Result<IdentityRecord, PersonUuidError> {
	return captureInputError(() => decodeIdentityRecord(halves));
}

/**
 * @returns true if `halves` is a person UUID, i.e. {@link decodeIdentityRecord} would succeed.
 */
export function isConformantPersonUuid(halves: UuidHalves): boolean {
	return Result.isOk(tryDecodeIdentityRecord(halves));
}
