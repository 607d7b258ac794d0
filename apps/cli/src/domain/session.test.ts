import { describe, expect, it } from 'vitest';
import {
	classifyStatus,
	makeSession,
	qualifiedName,
	splitQualifiedName,
	statusIcon,
} from './session.ts';

describe('classifyStatus', () => {
	it('defaults to unknown without a token', () => {
		expect(classifyStatus(undefined)).toBe('unknown');
		expect(classifyStatus('')).toBe('unknown');
	});

	it('maps exact names', () => {
		expect(classifyStatus('attached')).toBe('attached');
		expect(classifyStatus('multi')).toBe('multi');
		expect(classifyStatus('dead')).toBe('dead');
	});

	it('maps near misses to the closest status', () => {
		expect(classifyStatus('dettached')).toBe('detached');
		expect(classifyStatus('dead ???')).toBe('dead');
	});

	it('falls back to unknown for unrelated tokens', () => {
		expect(classifyStatus('zzz')).toBe('unknown');
		expect(classifyStatus('ed')).toBe('unknown');
	});
});

describe('splitQualifiedName', () => {
	it('splits on the first period only', () => {
		expect(splitQualifiedName('12345.my.dotted.name')).toEqual({
			id: '12345',
			name: 'my.dotted.name',
		});
	});

	it('rejects identifiers without a period or with an empty part', () => {
		expect(splitQualifiedName('12345')).toBeUndefined();
		expect(splitQualifiedName('.work')).toBeUndefined();
		expect(splitQualifiedName('12345.')).toBeUndefined();
	});
});

describe('qualifiedName', () => {
	it('joins id and name', () => {
		expect(qualifiedName(makeSession('work', '12345', 'detached'))).toBe('12345.work');
	});

	it('uses the bare name for sessions not yet created', () => {
		expect(qualifiedName(makeSession('work'))).toBe('work');
	});

	it('round-trips names containing periods', () => {
		const session = makeSession('a.b.c', '7', 'attached');
		expect(splitQualifiedName(qualifiedName(session))).toEqual({ id: '7', name: 'a.b.c' });
	});
});

describe('statusIcon', () => {
	it('marks dead sessions', () => {
		expect(statusIcon('dead')).toBe('X');
		expect(statusIcon('detached')).toBe('#');
	});
});
