/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

import { PersonUuidError, PersonUuidErrorType } from '../Common';
import type { IdentityNumber, IdentitySerial } from '../Identifiers';
import { decodeIdentityRecord } from './BinaryCodec';
import { createIdentityRecord, type IdentityRecord } from './IdentityRecord';
import { isUuidString, uuidHalvesFromString } from './UuidHalves';

const plainIdentityNumber = /^(?:\d{10}|\d{12})$/;
const separatedIdentityNumber = /^(\d{6}|\d{8})-(\d{4})$/;

/**
 * Reads the identity number from one of the written forms `NNNNNNNNNN`, `NNNNNNNNNNNN`, `NNNNNN-NNNN` and
 * `NNNNNNNN-NNNN`. The number is not validated.
 * @returns the identity number, or undefined if `text` is in none of these forms.
 */
export function identityNumberFromText(text: string): IdentityNumber | undefined {
	if (plainIdentityNumber.test(text)) {
		return Number.parseInt(text, 10);
	}

	const separated = separatedIdentityNumber.exec(text);
	if (separated !== null) {
		return Number.parseInt(separated[1] + separated[2], 10);
	}

	return undefined;
}

/**
 * Parses an identity number in one of its written forms, or the canonical text of a person UUID.
 * @param serial - serial for the record when `text` is an identity number. A person UUID carries its own serial.
 * @throws {@link PersonUuidError} if `text` is in no accepted form or does not hold a valid identity.
 */
export function parseIdentity(text: string, serial: IdentitySerial = 0): IdentityRecord {
	if (isUuidString(text)) {
		return decodeIdentityRecord(uuidHalvesFromString(text));
	}

	const identityNumber = identityNumberFromText(text);
	if (identityNumber === undefined) {
		throw new PersonUuidError(PersonUuidErrorType.UnparsableText, `Invalid identity number or person UUID: ${text}`);
	}
	return createIdentityRecord(identityNumber, serial);
}
