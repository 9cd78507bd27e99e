/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

import type { ITelemetryBaseLogger, ITelemetryLogger } from '@fluidframework/common-definitions';
import { ChildLogger, type ITelemetryLoggerPropertyBags } from '@fluidframework/telemetry-utils';
import { captureInputError, isPersonUuidError, PersonUuidError, Result } from './Common';
import type { IdentityNumber, IdentitySerial, IdentityType, UuidString } from './Identifiers';
import {
	createIdentityRecord,
	createIdentityRecordOfType,
	decodeIdentityRecord,
	encodeIdentityRecord,
	type IdentityRecord,
	isConformantPersonUuid,
	isUuidString,
	parseIdentity,
	uuidBytesFromHalves,
	uuidHalvesFromBytes,
	uuidHalvesFromString,
	uuidStringFromHalves,
} from './person-uuid';

/**
 * Options for configuring a {@link PersonUuidCodec}.
 * @public
 */
export interface PersonUuidCodecOptions {
	/**
	 * Receives an error event for every rejected input. The event names the operation and the
	 * {@link PersonUuidErrorType}; the input itself is never logged.
	 */
	logger?: ITelemetryBaseLogger;
	/** Extra properties attached to the events sent to `logger`. */
	telemetryProperties?: ITelemetryLoggerPropertyBags;
}

/**
 * Names of the codec operations, as reported in telemetry.
 */
type CodecOperation = 'fromNumber' | 'fromNumberOfType' | 'parse' | 'fromUuid' | 'fromBytes';

/**
 * Converts between Swedish identity numbers, their identity records and person UUIDs.
 *
 * @example
 * ```
 * const codec = new PersonUuidCodec({ logger });
 * codec.toUuid(codec.parse('556809-9963')); // '00556809-9963-1000-9000-d59a20d06c1a'
 * ```
 * @public
 */
export class PersonUuidCodec {
	private readonly logger: ITelemetryLogger;

	public constructor(options: PersonUuidCodecOptions = {}) {
		this.logger = ChildLogger.create(options.logger, 'PersonUuid', options.telemetryProperties);
	}

	/**
	 * Validates an identity number and derives its type.
	 */
	public fromNumber(identityNumber: IdentityNumber, serial: IdentitySerial = 0): IdentityRecord {
		return this.run('fromNumber', () => createIdentityRecord(identityNumber, serial));
	}

	/**
	 * Validates an identity number that must be of the given type.
	 */
	public fromNumberOfType(identityNumber: IdentityNumber, serial: IdentitySerial, type: IdentityType): IdentityRecord {
		return this.run('fromNumberOfType', () => createIdentityRecordOfType(identityNumber, serial, type));
	}

	/**
	 * Parses a written identity number (`YYMMDD-NNNC`, `YYYYMMDDNNNC`, ...) or the text of a person UUID.
	 */
	public parse(text: string, serial: IdentitySerial = 0): IdentityRecord {
		return this.run('parse', () => parseIdentity(text, serial));
	}

	/**
	 * Non-throwing form of {@link PersonUuidCodec.parse}. Rejections are still logged.
	 */
	public tryParse(text: string, serial: IdentitySerial = 0): Result<IdentityRecord, PersonUuidError> {
		return captureInputError(() => this.parse(text, serial));
	}

	/**
	 * Decodes the canonical text of a person UUID.
	 */
	public fromUuid(uuid: string): IdentityRecord {
		return this.run('fromUuid', () => decodeIdentityRecord(uuidHalvesFromString(uuid)));
	}

	/**
	 * Decodes the 16 byte binary form of a person UUID.
	 */
	public fromBytes(bytes: ArrayLike<number>): IdentityRecord {
		return this.run('fromBytes', () => decodeIdentityRecord(uuidHalvesFromBytes(bytes)));
	}

	/**
	 * @returns the canonical text of the person UUID for `record`.
	 */
	public toUuid(record: IdentityRecord): UuidString {
		return uuidStringFromHalves(encodeIdentityRecord(record));
	}

	/**
	 * @returns the 16 byte binary form of the person UUID for `record`.
	 */
	public toBytes(record: IdentityRecord): Uint8Array {
		return uuidBytesFromHalves(encodeIdentityRecord(record));
	}

	/**
	 * @returns true if `text` is the canonical text of a valid person UUID. Never throws or logs.
	 */
	public isPersonUuid(text: string): boolean {
		if (!isUuidString(text)) {
			return false;
		}
		const halves = captureInputError(() => uuidHalvesFromString(text));
		return Result.isOk(halves) && isConformantPersonUuid(halves.result);
	}

	private run<T>(operation: CodecOperation, fn: () => T): T {
		try {
			return fn();
		} catch (error: unknown) {
			if (isPersonUuidError(error)) {
				this.logger.sendErrorEvent({ eventName: 'InputRejected', operation, errorType: error.errorType });
			}
			throw error;
		}
	}
}
