import assert from 'node:assert/strict';
import test from 'node:test';
import {
	isPlainObject,
	sanitizeEnum,
	sanitizeNumber,
	sanitizeString,
	sanitizeStringList
} from '../config/sanitizers';

// --- sanitizeNumber ---

test('sanitizeNumber returns valid number clamped to min', () => {
	assert.equal(sanitizeNumber(50, 100, 0), 50);
	assert.equal(sanitizeNumber(-5, 100, 0), 0);
	assert.equal(sanitizeNumber(3.7, 100, 0), 3);
});

test('sanitizeNumber returns fallback for non-number', () => {
	assert.equal(sanitizeNumber('50', 100, 0), 100);
	assert.equal(sanitizeNumber(undefined, 100, 0), 100);
	assert.equal(sanitizeNumber(null, 100, 0), 100);
});

test('sanitizeNumber returns fallback for NaN and Infinity', () => {
	assert.equal(sanitizeNumber(NaN, 100, 0), 100);
	assert.equal(sanitizeNumber(Infinity, 100, 0), 100);
	assert.equal(sanitizeNumber(-Infinity, 100, 0), 100);
});

// --- sanitizeEnum ---

test('sanitizeEnum returns value when in allowed list', () => {
	assert.equal(sanitizeEnum('serial', ['tcp', 'serial'] as const, 'tcp'), 'serial');
});

test('sanitizeEnum returns fallback for invalid value', () => {
	assert.equal(sanitizeEnum('usb', ['tcp', 'serial'] as const, 'tcp'), 'tcp');
	assert.equal(sanitizeEnum(42, ['tcp', 'serial'] as const, 'tcp'), 'tcp');
	assert.equal(sanitizeEnum(undefined, ['tcp', 'serial'] as const, 'serial'), 'serial');
});

// --- sanitizeString ---

test('sanitizeString trims and falls back on blank', () => {
	assert.equal(sanitizeString('  /dev/ttyUSB1 ', 'x'), '/dev/ttyUSB1');
	assert.equal(sanitizeString('   ', 'x'), 'x');
	assert.equal(sanitizeString(7, 'x'), 'x');
});

// --- sanitizeStringList ---

test('sanitizeStringList keeps trimmed non-empty strings', () => {
	assert.deepEqual(sanitizeStringList([' --fps ', 30, '', '  ', '15']), ['--fps', '15']);
});

test('sanitizeStringList returns empty list for non-array', () => {
	assert.deepEqual(sanitizeStringList('--fps'), []);
	assert.deepEqual(sanitizeStringList(undefined), []);
});

// --- isPlainObject ---

test('isPlainObject accepts objects only', () => {
	assert.equal(isPlainObject({ a: 1 }), true);
	assert.equal(isPlainObject([]), false);
	assert.equal(isPlainObject(null), false);
	assert.equal(isPlainObject('x'), false);
});
