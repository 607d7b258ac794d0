type Block = { aStart: number; bStart: number; size: number };

function longestCommonBlock(
	a: string,
	b: string,
	aLo: number,
	aHi: number,
	bLo: number,
	bHi: number,
): Block {
	let best: Block = { aStart: aLo, bStart: bLo, size: 0 };
	let lengths = new Array<number>(bHi - bLo + 1).fill(0);
	for (let i = aLo; i < aHi; i++) {
		const next = new Array<number>(bHi - bLo + 1).fill(0);
		for (let j = bLo; j < bHi; j++) {
			if (a[i] !== b[j]) continue;
			const size = (lengths[j - bLo] ?? 0) + 1;
			next[j - bLo + 1] = size;
			if (size > best.size) {
				best = { aStart: i - size + 1, bStart: j - size + 1, size };
			}
		}
		lengths = next;
	}
	return best;
}

function matchingCharacters(
	a: string,
	b: string,
	aLo: number,
	aHi: number,
	bLo: number,
	bHi: number,
): number {
	if (aLo >= aHi || bLo >= bHi) return 0;
	const block = longestCommonBlock(a, b, aLo, aHi, bLo, bHi);
	if (block.size === 0) return 0;
	return (
		block.size +
		matchingCharacters(a, b, aLo, block.aStart, bLo, block.bStart) +
		matchingCharacters(
			a,
			b,
			block.aStart + block.size,
			aHi,
			block.bStart + block.size,
			bHi,
		)
	);
}

/**
 * Ratcliff/Obershelp similarity: twice the number of matching characters
 * over the total length of both strings, in `[0, 1]`.
 */
export function similarity(a: string, b: string): number {
	const total = a.length + b.length;
	if (total === 0) return 1;
	return (2 * matchingCharacters(a, b, 0, a.length, 0, b.length)) / total;
}

export const DEFAULT_CUTOFF = 0.6;

/**
 * Best-scoring candidate at or above `cutoff`. Each candidate is scored as
 * `similarity(candidate, word)`, which is not symmetric. Equal scores go to
 * the lexicographically greater candidate.
 */
export function closestMatch<const T extends string>(
	word: string,
	candidates: ReadonlyArray<T>,
	cutoff: number = DEFAULT_CUTOFF,
): T | undefined {
	let best: { candidate: T; score: number } | undefined;
	for (const candidate of candidates) {
		const score = similarity(candidate, word);
		if (score < cutoff) continue;
		if (
			best === undefined ||
			score > best.score ||
			(score === best.score && candidate > best.candidate)
		) {
			best = { candidate, score };
		}
	}
	return best?.candidate;
}
