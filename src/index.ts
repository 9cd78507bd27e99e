/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

/**
 * Encodes Swedish identity numbers (organisation, personal, coordination and GDNR numbers) as version 1 shaped
 * UUIDs that still read as the identity number.
 *
 * @packageDocumentation
 */

/**
 * This file represents the public API. Consumers of this package will not see exported modules unless they are enumerated here.
 * Removing / editing existing exports here will often indicate a breaking change, so please be cognizant of changes made here.
 */

export { PersonUuidError, PersonUuidErrorType, isPersonUuidError, Result } from './Common';
export {
	IdentityType,
	isIdentityTypeCode,
	type IdentityNumber,
	type IdentitySerial,
	type UuidString,
} from './Identifiers';
export * from './person-uuid';
export { PersonUuidCodec, type PersonUuidCodecOptions } from './PersonUuidCodec';
