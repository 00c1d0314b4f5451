import { describe, expect, it } from 'vitest';
import { HeuristicClaimJudge, StructuredClaimJudge, createClaimJudge, lexicalCoverage, verdictFromText } from '../claim_judge.js';
import { makeEvidence, scriptedGenerator } from './fixtures.js';

const evidence = [makeEvidence('c1', 'The sky is blue. Water is wet.')];

describe('verdictFromText', () => {
  it('reads the word unsupported case-insensitively', () => {
    expect(verdictFromText('UNSUPPORTED: nothing says so')).toBe('unsupported');
    expect(verdictFromText('Supported by [1].')).toBe('supported');
    expect(verdictFromText('')).toBe('supported');
  });

  it('does not match unsupported inside another word', () => {
    expect(verdictFromText('unsupportedness')).toBe('supported');
  });
});

describe('lexicalCoverage', () => {
  it('is the share of distinct claim tokens found in the evidence', () => {
    expect(lexicalCoverage('The sky is blue', evidence)).toBe(1);
    expect(lexicalCoverage('The sky is green', evidence)).toBe(0.75);
    expect(lexicalCoverage('sky sky green', evidence)).toBe(0.5);
  });

  it('is zero for a claim without tokens', () => {
    expect(lexicalCoverage('?!', evidence)).toBe(0);
  });
});

describe('HeuristicClaimJudge', () => {
  it('takes the verdict from free text and confidence from coverage', async () => {
    const judge = new HeuristicClaimJudge(scriptedGenerator(' unsupported, the sources say blue '));

    expect(await judge.judge('The sky is green', evidence)).toEqual({
      verdict: 'unsupported',
      confidence: 0.75,
      notes: 'unsupported, the sources say blue',
    });
  });

  it('defaults to supported on empty output', async () => {
    const judge = new HeuristicClaimJudge(scriptedGenerator(''));

    expect(await judge.judge('The sky is blue.', evidence)).toEqual({
      verdict: 'supported',
      confidence: 1,
      notes: 'No judge output; verdict defaults to supported.',
    });
  });

  it('sends the claim and numbered sources', async () => {
    const generator = scriptedGenerator('supported');
    await new HeuristicClaimJudge(generator).judge('Water is wet.', evidence);

    expect(generator.calls[0]?.userContent).toBe(
      'Claim: Water is wet.\n\nSources:\n[1] Doc One (local://doc-1)\nThe sky is blue. Water is wet.',
    );
  });
});

describe('StructuredClaimJudge', () => {
  it('parses a JSON verdict inside a code block', async () => {
    const judge = new StructuredClaimJudge(
      scriptedGenerator('```json\n{"verdict": "unsupported", "confidence": 0.333, "notes": " No source. "}\n```'),
    );

    expect(await judge.judge('The sky is green', evidence)).toEqual({
      verdict: 'unsupported',
      confidence: 0.33,
      notes: 'No source.',
    });
  });

  it('fills empty notes from the verdict', async () => {
    const judge = new StructuredClaimJudge(scriptedGenerator('{"verdict": "supported", "confidence": 0.9}'));

    expect(await judge.judge('The sky is blue', evidence)).toEqual({
      verdict: 'supported',
      confidence: 0.9,
      notes: 'Judge verdict: supported.',
    });
  });

  it('falls back to the heuristic reading on malformed JSON', async () => {
    const judge = new StructuredClaimJudge(scriptedGenerator('Unsupported: confidence high'));

    expect(await judge.judge('The sky is green', evidence)).toEqual({
      verdict: 'unsupported',
      confidence: 0.75,
      notes: 'Unsupported: confidence high',
    });
  });

  it('falls back when confidence is out of range', async () => {
    const judge = new StructuredClaimJudge(scriptedGenerator('{"verdict": "supported", "confidence": 3}'));

    const judgement = await judge.judge('The sky is blue', evidence);
    expect(judgement.verdict).toBe('supported');
    expect(judgement.confidence).toBe(1);
    expect(judgement.notes).toBe('{"verdict": "supported", "confidence": 3}');
  });
});

describe('createClaimJudge', () => {
  it('selects the judge by kind', () => {
    const generator = scriptedGenerator('');
    expect(createClaimJudge('heuristic', generator).id).toBe('heuristic');
    expect(createClaimJudge('structured', generator).id).toBe('structured');
  });
});
