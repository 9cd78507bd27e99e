/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

import { PersonUuidError, PersonUuidErrorType } from '../Common';
import { IdentityType } from '../Identifiers';
import { isValidDate } from './Calendar';

/**
 * The date-like fields of an identity number `YYYYMMDDNNNC`. For organisation numbers the "month" is 20 or more and
 * the fields carry no date. For coordination numbers the day has 60 added.
 */
export interface IdentityDate {
	/** All digits above the last 8, including the century when present. */
	readonly year: number;
	readonly month: number;
	readonly day: number;
}

/**
 * `floor(number / 10^7)` of every GDNR.
 */
const gdnrPrefix = 302;

/**
 * Day offset of coordination numbers.
 */
const samnrDayOffset = 60;

/**
 * Centuries in which organisation numbers are written: none (10 digits) or the conventional 16.
 */
const orgnrCenturies: ReadonlySet<number> = new Set([0, 16]);
const minOrgnrMonth = 20;

/**
 * Earliest century accepted for the birth year of a personal number.
 */
const minPersnrCentury = 18;

/**
 * Splits an identity number into its year, month and day fields.
 */
export function getIdentityDate(identityNumber: number): IdentityDate {
	return {
		year: Math.floor(identityNumber / 1e8),
		month: Math.floor(identityNumber / 1e6) % 100,
		day: Math.floor(identityNumber / 1e4) % 100,
	};
}

function assertValidDate(identityNumber: number, year: number, month: number, day: number): void {
	if (!isValidDate(year, month, day)) {
		throw new PersonUuidError(
			PersonUuidErrorType.InvalidDate,
			`Invalid date in identity ${identityNumber}: ${year}-${month}-${day}`
		);
	}
}

/**
 * Derives the kind of identity number from its digits. Personal and coordination numbers must carry a real date.
 * @throws {@link PersonUuidError} with `InvalidDate` or `UnclassifiableNumber`.
 */
export function classifyIdentityNumber(identityNumber: number): IdentityType {
	if (Math.floor(identityNumber / 1e7) === gdnrPrefix) {
		return IdentityType.Gdnr;
	}

	const { year, month, day } = getIdentityDate(identityNumber);
	const century = Math.floor(year / 100);
	if (orgnrCenturies.has(century) && month >= minOrgnrMonth) {
		return IdentityType.Orgnr;
	}

	const isMonth = month >= 1 && month <= 12;
	if (century >= minPersnrCentury && isMonth && day >= 1 && day <= 31) {
		assertValidDate(identityNumber, year, month, day);
		return IdentityType.Persnr;
	}

	if (isMonth && day >= 1 + samnrDayOffset && day <= 31 + samnrDayOffset) {
		assertValidDate(identityNumber, year, month, day - samnrDayOffset);
		return IdentityType.Samnr;
	}

	throw new PersonUuidError(PersonUuidErrorType.UnclassifiableNumber, `Invalid identity number: ${identityNumber}`);
}
