/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

/**
 * Exports for `person-uuid`
 */

export { encodeBcdDigits, decodeBcdDigits } from './Bcd';
export { computeLuhnCheckDigit, hasValidCheckDigit } from './Luhn';
export { isLeapYear, daysInMonth, isValidDate } from './Calendar';
export { type IdentityDate, getIdentityDate, classifyIdentityNumber } from './Classifier';
export {
	type IdentityRecord,
	createIdentityRecord,
	createIdentityRecordOfType,
	identityRecordsEqual,
	compareIdentityRecords,
	formatIdentityNumber,
} from './IdentityRecord';
export {
	type UuidHalves,
	isUuidString,
	uuidHalvesFromString,
	uuidStringFromHalves,
	uuidHalvesFromBytes,
	uuidBytesFromHalves,
} from './UuidHalves';
export {
	personUuidNodeId,
	encodeIdentityRecord,
	decodeIdentityRecord,
	tryDecodeIdentityRecord,
	isConformantPersonUuid,
} from './BinaryCodec';
export { identityNumberFromText, parseIdentity } from './TextParser';
