/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

/**
 * Categories of failure reported by {@link PersonUuidError}. Every failure is a rejection of caller-supplied input;
 * none of them is transient.
 * @public
 */
export enum PersonUuidErrorType {
	/** A number or serial outside its representable range (negative, fractional, too many digits). */
	MalformedNumber = 'MalformedNumber',
	/** The last digit of the identity number is not its Luhn check digit. */
	ChecksumMismatch = 'ChecksumMismatch',
	/** The date embedded in a personal or coordination number does not exist. */
	InvalidDate = 'InvalidDate',
	/** The digits match none of the known identity number shapes. */
	UnclassifiableNumber = 'UnclassifiableNumber',
	/** A 128-bit value does not follow the person UUID bit layout. */
	NonConformantBinary = 'NonConformantBinary',
	/** Text matches none of the accepted identity or UUID formats. */
	UnparsableText = 'UnparsableText',
}

/**
 * Error thrown when input cannot be turned into a person UUID.
 *
 * Callers should treat it as an input validation failure. `errorType` is safe to log; `message` may contain the
 * rejected identity number and must be treated as personal data.
 * @public
 */
export class PersonUuidError extends Error {
	public constructor(public readonly errorType: PersonUuidErrorType, message: string) {
		super(message);
		this.name = 'PersonUuidError';
		Error.captureStackTrace?.(this, PersonUuidError);
	}
}

/**
 * @returns true if `error` was thrown by this library because of invalid input.
 * @public
 */
export function isPersonUuidError(error: unknown): error is PersonUuidError {
	return error instanceof PersonUuidError;
}

/**
 * Discriminated union instance that wraps either a result of type `TOk` or an error of type `TError`.
 * @public
 */
export type Result<TOk, TError> = Result.Ok<TOk> | Result.Error<TError>;

/**
 * @public
 */
export namespace Result {
	/**
	 * Factory function for making a successful Result.
	 * @param result - The result to wrap in the Result.
	 */
	export function ok<TOk>(result: TOk): Ok<TOk> {
		return { type: ResultType.Ok, result };
	}
	/**
	 * Factory function for making a unsuccessful Result.
	 * @param error - The error to wrap in the Result.
	 */
	export function error<TError>(error: TError): Error<TError> {
		return { type: ResultType.Error, error };
	}
	/**
	 * Type guard for successful Result.
	 * @returns True if `result` is successful.
	 */
	export function isOk<TOk, TError>(result: Result<TOk, TError>): result is Ok<TOk> {
		return result.type === ResultType.Ok;
	}
	/**
	 * Type guard for unsuccessful Result.
	 * @returns True if `result` is unsuccessful.
	 */
	export function isError<TOk, TError>(result: Result<TOk, TError>): result is Error<TError> {
		return result.type === ResultType.Error;
	}
	/**
	 * Tag value use to differentiate the members of the `Result` discriminated union.
	 */
	export enum ResultType {
		/** Signals a successful result. */
		Ok,
		/** Signals an unsuccessful result. */
		Error,
	}
	/**
	 * Wraps a result of type `TOk`.
	 */
	export interface Ok<TOk> {
		readonly type: ResultType.Ok;
		readonly result: TOk;
	}
	/**
	 * Wraps an error of type `TError`.
	 */
	export interface Error<TError> {
		readonly type: ResultType.Error;
		readonly error: TError;
	}
}

/**
 * Runs `fn`, capturing a thrown {@link PersonUuidError} as an error result. Any other error is rethrown.
 */
export function captureInputError<T>(fn: () => T): Result<T, PersonUuidError> {
	try {
		return Result.ok(fn());
	} catch (error: unknown) {
		if (isPersonUuidError(error)) {
			return Result.error(error);
		}
		throw error;
	}
}

/**
 * Compares finite numbers to form a strict partial ordering.
 * @returns a negative number if `a` is before `b`, 0 if equal, positive otherwise.
 */
export function compareFiniteNumbers<T extends number>(a: T, b: T): number {
	return a - b;
}
