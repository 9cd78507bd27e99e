/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

import { expect } from 'chai';
import { daysInMonth, isLeapYear, isValidDate } from '../person-uuid/Calendar';

describe('Calendar', () => {
	it('applies the Gregorian leap year rule', () => {
		expect(isLeapYear(2024)).to.be.true;
		expect(isLeapYear(2023)).to.be.false;
		expect(isLeapYear(1900)).to.be.false;
		expect(isLeapYear(2000)).to.be.true;
		expect(isLeapYear(1600)).to.be.true;
	});

	it('knows the length of each month', () => {
		const lengths = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
		lengths.forEach((length, index) => expect(daysInMonth(2023, index + 1)).to.equal(length));
		expect(daysInMonth(2024, 2)).to.equal(29);
		expect(daysInMonth(2023, 0)).to.equal(0);
		expect(daysInMonth(2023, 13)).to.equal(0);
	});

	it('accepts February 29 only in leap years', () => {
		expect(isValidDate(2024, 2, 29)).to.be.true;
		expect(isValidDate(2000, 2, 29)).to.be.true;
		expect(isValidDate(2023, 2, 29)).to.be.false;
		expect(isValidDate(1900, 2, 29)).to.be.false;
	});

	it('rejects days outside the month', () => {
		expect(isValidDate(1970, 12, 31)).to.be.true;
		expect(isValidDate(1970, 12, 32)).to.be.false;
		expect(isValidDate(1970, 11, 31)).to.be.false;
		expect(isValidDate(1970, 1, 0)).to.be.false;
	});

	it('rejects months outside 1 to 12', () => {
		expect(isValidDate(1970, 0, 1)).to.be.false;
		expect(isValidDate(1970, 13, 1)).to.be.false;
		expect(isValidDate(1970, 20, 1)).to.be.false;
	});
});
