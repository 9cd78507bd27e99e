/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

/**
 * Type-safe identifiers for specific use cases.
 */

/**
 * A 128-bit Universally Unique IDentifier. Represented here
 * with a string of the form xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx,
 * where x is a lowercase hex digit.
 * @public
 */
export type UuidString = string & { readonly UuidString: '5f0a3c1e-7d52-4b8e-9a61-0c2e4d7b9f13' };

/**
 * The kind of Swedish identity number. The numeric value is the type code stored in a person UUID.
 * @public
 */
export enum IdentityType {
	/** Organisationsnummer: legal entities. */
	Orgnr = 0,
	/** Personnummer: natural persons, embeds the date of birth. */
	Persnr = 1,
	/** Samordningsnummer: coordination number, embeds the date of birth with 60 added to the day. */
	Samnr = 2,
	/** Gemensamt dödsboidentitetsnummer: reserved placeholder numbers starting with 302. */
	Gdnr = 3,
}

/**
 * The largest type code a person UUID may carry.
 */
export const maxIdentityTypeCode = IdentityType.Gdnr;

/**
 * @returns true if `code` is the type code of a known {@link IdentityType}.
 */
export function isIdentityTypeCode(code: number): code is IdentityType {
	return Number.isInteger(code) && code >= IdentityType.Orgnr && code <= maxIdentityTypeCode;
}

/**
 * A decimal identity number, at most 12 digits, with its check digit last.
 * @public
 */
export type IdentityNumber = number;

/**
 * Disambiguates several registrations under the same identity number. 0 to 999.
 * @public
 */
export type IdentitySerial = number;
