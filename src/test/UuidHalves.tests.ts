/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

import { expect } from 'chai';
import { PersonUuidErrorType } from '../Common';
import {
	isUuidString,
	uuidBytesFromHalves,
	uuidHalvesFromBytes,
	uuidHalvesFromString,
	uuidStringFromHalves,
} from '../person-uuid/UuidHalves';
import { expectPersonUuidError } from './utilities/PersonUuidTestUtilities';

describe('UuidHalves', () => {
	const text = '00556809-9963-1000-9000-d59a20d06c1a';
	const halves = { high: 0x0055680999631000n, low: 0x9000d59a20d06c1an };

	it('recognizes the UUID text shape', () => {
		expect(isUuidString(text)).to.be.true;
		expect(isUuidString(text.toUpperCase())).to.be.true;
		expect(isUuidString('0055680999631000' + '9000d59a20d06c1a')).to.be.false;
		expect(isUuidString('00556809-9963-1000-9000-d59a20d06c1')).to.be.false;
		expect(isUuidString('0055680g-9963-1000-9000-d59a20d06c1a')).to.be.false;
	});

	it('splits UUID text into halves', () => {
		expect(uuidHalvesFromString(text)).to.deep.equal(halves);
		expect(uuidHalvesFromString(text.toUpperCase())).to.deep.equal(halves);
	});

	it('writes halves as lowercase UUID text', () => {
		expect(uuidStringFromHalves(halves)).to.equal(text);
		expect(uuidStringFromHalves({ high: 0x1941061777531099n, low: 0x9001d59a20d06c1an })).to.equal(
			'19410617-7753-1099-9001-d59a20d06c1a'
		);
	});

	it('rejects text that is not UUID shaped', () => {
		expectPersonUuidError(() => uuidHalvesFromString('556809-9963'), PersonUuidErrorType.UnparsableText);
	});

	it('rejects UUID shaped text that is not an RFC 4122 UUID', () => {
		expectPersonUuidError(
			() => uuidHalvesFromString('00556809-9963-0000-9000-d59a20d06c1a'),
			PersonUuidErrorType.NonConformantBinary
		);
	});

	it('converts to and from the 16 byte form', () => {
		const bytes = uuidBytesFromHalves(halves);
		expect(Array.from(bytes)).to.deep.equal([
			0x00, 0x55, 0x68, 0x09, 0x99, 0x63, 0x10, 0x00, 0x90, 0x00, 0xd5, 0x9a, 0x20, 0xd0, 0x6c, 0x1a,
		]);
		expect(uuidHalvesFromBytes(bytes)).to.deep.equal(halves);
	});

	it('rejects byte arrays of the wrong length', () => {
		expectPersonUuidError(() => uuidHalvesFromBytes(new Uint8Array(15)), PersonUuidErrorType.NonConformantBinary);
		expectPersonUuidError(() => uuidHalvesFromBytes([]), PersonUuidErrorType.NonConformantBinary);
	});

	it('rejects byte arrays holding values that are not bytes', () => {
		const valid = Array.from(uuidBytesFromHalves(halves));
		for (const value of [0x110, 256, -1, 0.5, Number.NaN]) {
			const bytes = [...valid];
			bytes[6] = value;
			expectPersonUuidError(() => uuidHalvesFromBytes(bytes), PersonUuidErrorType.NonConformantBinary);
		}
		const overflowing = [...valid];
		overflowing[5] = 0x62;
		overflowing[6] = 0x110;
		expect(() => uuidHalvesFromBytes(overflowing)).to.throw('Invalid UUID byte at 6: 272');
	});
});
