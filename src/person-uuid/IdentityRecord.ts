/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

import { compareFiniteNumbers, PersonUuidError, PersonUuidErrorType } from '../Common';
import { type IdentityNumber, type IdentitySerial, IdentityType, isIdentityTypeCode } from '../Identifiers';
import { classifyIdentityNumber } from './Classifier';
import { expectedCheckDigit, hasValidCheckDigit } from './Luhn';

/**
 * A validated Swedish identity number, the value encoded by a person UUID.
 *
 * Records are frozen and branded: they can only be obtained from the factories in this module (or by decoding), all
 * of which either return a fully validated record or throw.
 * @public
 */
export type IdentityRecord = {
	readonly number: IdentityNumber;
	readonly serial: IdentitySerial;
	readonly type: IdentityType;
} & { readonly IdentityRecord: '3b8e6f2a-91c4-4d07-b5e2-7a1f0c9d4e68' };

/** Exclusive upper bound of an identity number (12 decimal digits). */
const identityNumberLimit = 1e12;
/** Inclusive upper bound of a serial (3 decimal digits). */
const maxIdentitySerial = 999;

const shortIdentityNumberLimit = 1e10;

function validateRanges(identityNumber: number, serial: number): void {
	if (!Number.isSafeInteger(identityNumber) || identityNumber < 0 || identityNumber >= identityNumberLimit) {
		throw new PersonUuidError(PersonUuidErrorType.MalformedNumber, `Invalid identity number: ${identityNumber}`);
	}
	if (!Number.isInteger(serial) || serial < 0 || serial > maxIdentitySerial) {
		throw new PersonUuidError(PersonUuidErrorType.MalformedNumber, `Invalid identity serial number: ${serial}`);
	}
}

function validateCheckDigit(identityNumber: number): void {
	if (!hasValidCheckDigit(identityNumber)) {
		throw new PersonUuidError(
			PersonUuidErrorType.ChecksumMismatch,
			`Check digit mismatch in identity ${identityNumber}, expected ${expectedCheckDigit(identityNumber)}`
		);
	}
}

function validateTypeCode(typeCode: number): asserts typeCode is IdentityType {
	if (!isIdentityTypeCode(typeCode)) {
		throw new PersonUuidError(PersonUuidErrorType.NonConformantBinary, `Invalid id type: ${typeCode}`);
	}
}

function freezeRecord(number: number, serial: number, type: IdentityType): IdentityRecord {
	return Object.freeze({ number, serial, type }) as IdentityRecord;
}

/**
 * Validates an identity number and derives its type from the digits.
 * @param identityNumber - 10 or 12 digit identity number, without separator
 * @param serial - registration serial, 0 when not used
 * @throws {@link PersonUuidError} when the number is out of range, fails its check digit, embeds an invalid date or
 * is not a known kind of identity number.
 */
export function createIdentityRecord(identityNumber: IdentityNumber, serial: IdentitySerial = 0): IdentityRecord {
	validateRanges(identityNumber, serial);
	validateCheckDigit(identityNumber);
	return freezeRecord(identityNumber, serial, classifyIdentityNumber(identityNumber));
}

/**
 * Like {@link createIdentityRecord}, but additionally requires the derived type to be `type`.
 * @throws {@link PersonUuidError} with `UnclassifiableNumber` if the number is of another type.
 */
export function createIdentityRecordOfType(
	identityNumber: IdentityNumber,
	serial: IdentitySerial,
	type: IdentityType
): IdentityRecord {
	const record = createIdentityRecord(identityNumber, serial);
	if (record.type !== type) {
		throw new PersonUuidError(
			PersonUuidErrorType.UnclassifiableNumber,
			`Identity ${identityNumber} is ${IdentityType[record.type]}, not ${IdentityType[type]}`
		);
	}
	return record;
}

/**
 * Rebuilds a record read from an encoded person UUID. The type is taken as stored and the embedded date is not
 * revalidated; ranges and the check digit are.
 * @internal
 */
export function restoreIdentityRecord(identityNumber: number, serial: number, typeCode: number): IdentityRecord {
	validateRanges(identityNumber, serial);
	validateTypeCode(typeCode);
	validateCheckDigit(identityNumber);
	return freezeRecord(identityNumber, serial, typeCode);
}

/**
 * Re-checks a record the way {@link restoreIdentityRecord} checks decoded fields. Catches records that were copied
 * and modified (`{ ...record, serial: 1000 }`) rather than built by a factory.
 * @throws {@link PersonUuidError} if a field is out of range, the type code is unknown or the check digit fails.
 * @internal
 */
export function validateIdentityRecord({ number, serial, type }: IdentityRecord): void {
	validateRanges(number, serial);
	validateTypeCode(type);
	validateCheckDigit(number);
}

/**
 * @returns true if both records hold the same number, serial and type.
 * @public
 */
export function identityRecordsEqual(a: IdentityRecord, b: IdentityRecord): boolean {
	return a.number === b.number && a.serial === b.serial && a.type === b.type;
}

/**
 * Orders records by type, then number, then serial.
 * @returns a negative number if `a` sorts before `b`, 0 if equal, positive otherwise.
 * @public
 */
export function compareIdentityRecords(a: IdentityRecord, b: IdentityRecord): number {
	return (
		compareFiniteNumbers(a.type, b.type) ||
		compareFiniteNumbers(a.number, b.number) ||
		compareFiniteNumbers(a.serial, b.serial)
	);
}

/**
 * Formats the identity number the way it is usually written: `YYMMDD-NNNC` for 10 digit numbers and
 * `YYYYMMDD-NNNC` otherwise.
 * @public
 */
export function formatIdentityNumber(record: IdentityRecord): string {
	const digits = record.number.toString().padStart(record.number < shortIdentityNumberLimit ? 10 : 12, '0');
	return `${digits.slice(0, -4)}-${digits.slice(-4)}`;
}
