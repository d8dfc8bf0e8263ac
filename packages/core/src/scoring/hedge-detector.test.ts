import { describe, it, expect } from 'vitest';
import { classifyClaimType, detectHedges, mergeHedgeFlags } from './hedge-detector.js';

describe('detectHedges', () => {
  it('should return distinct markers in order of appearance', () => {
    expect(detectHedges('It might possibly rain, and it MIGHT snow')).toEqual(['might', 'possibly']);
  });

  it('should detect multi-word markers', () => {
    expect(detectHedges('I think the  release was, reportedly, delayed')).toEqual([
      'i think',
      'reportedly',
    ]);
  });

  it('should not mistake the month of May for a hedge', () => {
    expect(detectHedges('The bridge opened in May 1932')).toEqual([]);
    expect(detectHedges('The bridge opened in May, after long delays')).toEqual([]);
    expect(detectHedges('The fix may land in may 2025')).toEqual(['may']);
    expect(detectHedges('May be delayed until spring')).toEqual(['may']);
  });

  it('should return nothing for an assertive claim', () => {
    expect(detectHedges('Python 3.12 completely removed the GIL')).toEqual([]);
  });
});

describe('mergeHedgeFlags', () => {
  it('should keep declared flags and append detected ones', () => {
    expect(mergeHedgeFlags(['Allegedly'], 'It may be true')).toEqual(['allegedly', 'may']);
  });

  it('should not duplicate a declared flag that is also detected', () => {
    expect(mergeHedgeFlags(['may'], 'It may be true')).toEqual(['may']);
  });
});

describe('classifyClaimType', () => {
  it('should classify hedged claims first', () => {
    expect(classifyClaimType('It might rain because of the front')).toBe('HEDGED');
  });

  it('should classify causal chains as multi-hop', () => {
    expect(classifyClaimType('The bridge closed because of the storm')).toBe('MULTI_HOP');
  });

  it('should classify statistics as quantitative', () => {
    expect(classifyClaimType('The model has 175 billion parameters')).toBe('QUANTITATIVE');
  });

  it('should classify comparisons', () => {
    expect(classifyClaimType('Rust is faster than Ruby')).toBe('COMPARATIVE');
  });

  it('should classify time-bound claims as temporal', () => {
    expect(classifyClaimType('As of 2023 the library is maintained')).toBe('TEMPORAL');
  });

  it('should not classify a dated claim as hedged', () => {
    expect(classifyClaimType('The bridge opened in May 1932')).toBe('DIRECT');
  });

  it('should fall back to direct', () => {
    expect(classifyClaimType('Paris is the capital of France')).toBe('DIRECT');
  });
});
