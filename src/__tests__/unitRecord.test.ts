import assert from 'node:assert/strict';
import test from 'node:test';
import { DEVICE_IDS } from '../device/deviceSlots';
import { EvaluatedLedger } from '../device/evaluatedLedger';
import {
	allOk,
	ANALOG_MAX_SENTINEL,
	ANALOG_MIN_SENTINEL,
	buttonsOk,
	createUnitRecord,
	markVerified,
	versionSummary
} from '../device/unitRecord';

test('createUnitRecord starts with every device unverified', () => {
	const record = createUnitRecord(7);

	assert.equal(record.sequenceId, 7);
	assert.equal(record.serial, '');
	assert.equal(record.health, 'ERROR');
	for (const id of DEVICE_IDS) {
		assert.deepEqual(record.devices[id], { verified: false, value: 0 });
	}
	assert.equal(record.analogChannels.length, 4);
	assert.deepEqual(record.analogChannels[0], { last: 0, min: ANALOG_MIN_SENTINEL, max: ANALOG_MAX_SENTINEL, delta: 0 });
	assert.deepEqual(record.orientation, [0, 0, 0, 0, 0]);
});

test('device tables are not shared between records', () => {
	const first = createUnitRecord(0);
	const second = createUnitRecord(1);

	first.devices.button0.value = 3;
	first.analogChannels[0].last = 12;

	assert.equal(second.devices.button0.value, 0);
	assert.equal(second.analogChannels[0].last, 0);
});

test('markVerified latches and never clears', () => {
	const record = createUnitRecord(0);

	markVerified(record, 'sounds', false);
	assert.equal(record.devices.sounds.verified, false);
	markVerified(record, 'sounds');
	markVerified(record, 'sounds', false);
	assert.equal(record.devices.sounds.verified, true);
});

test('group predicates require every member', () => {
	const record = createUnitRecord(0);
	markVerified(record, 'button0');
	markVerified(record, 'button1');
	assert.equal(buttonsOk(record), false);

	markVerified(record, 'button2');
	assert.equal(buttonsOk(record), true);
	assert.equal(allOk(record), false);

	for (const id of DEVICE_IDS) {
		markVerified(record, id);
	}
	assert.equal(allOk(record), true);
});

test('versionSummary joins hardware, firmware and software', () => {
	const record = createUnitRecord(0);
	record.versions = { hardware: '1.0.4', firmware: '1.2.0', software: '0.7.3' };

	assert.equal(versionSummary(record), '1.0.4/1.2.0/0.7.3');
});

test('EvaluatedLedger indexes finalized units by serial', () => {
	const ledger = new EvaluatedLedger();
	const first = createUnitRecord(0);
	first.serial = '00000001-00000002-00000003';
	const anonymous = createUnitRecord(1);

	ledger.append(first);
	ledger.append(anonymous);

	assert.equal(ledger.size, 2);
	assert.equal(ledger.has('00000001-00000002-00000003'), true);
	assert.equal(ledger.has(''), false);
});

test('EvaluatedLedger counts a repeated serial once in the index', () => {
	const ledger = new EvaluatedLedger();
	const first = createUnitRecord(0);
	first.serial = 'A';
	const second = createUnitRecord(1);
	second.serial = 'A';

	ledger.append(first);
	ledger.append(second);

	assert.equal(ledger.size, 2);
	assert.equal(ledger.has('A'), true);
});
