/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

/**
 * @returns true if `year` is a leap year in the proleptic Gregorian calendar.
 */
export function isLeapYear(year: number): boolean {
	return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
}

/**
 * @param month - 1 to 12
 * @returns the number of days in the month, or 0 if `month` is not a month.
 */
export function daysInMonth(year: number, month: number): number {
	switch (month) {
		case 2:
			return isLeapYear(year) ? 29 : 28;
		case 4:
		case 6:
		case 9:
		case 11:
			return 30;
		case 1:
		case 3:
		case 5:
		case 7:
		case 8:
		case 10:
		case 12:
			return 31;
		default:
			return 0;
	}
}

/**
 * @returns true if the year, month (1 to 12) and day of month name a real Gregorian date.
 */
export function isValidDate(year: number, month: number, day: number): boolean {
	return Number.isInteger(day) && day >= 1 && day <= daysInMonth(year, month);
}
