/**
 * Ledger arithmetic: raw XP and the soft cap.
 */
import { describe, it, expect } from 'vitest';
import { applySoftCap, computeRawXP, isAtSoftCap, softCapPercentage } from '../../src/services/LedgerService';

describe('computeRawXP', () => {
  it('rounds up the multiplied base', () => {
    expect(computeRawXP(30, 1.2)).toBe(36);
    expect(computeRawXP(45, 0.3)).toBe(14);
    expect(computeRawXP(15, 0.5)).toBe(8);
  });

  it('never yields less than 1', () => {
    expect(computeRawXP(1, 0.3)).toBe(1);
  });
});

describe('applySoftCap', () => {
  it('credits in full below the cap', () => {
    expect(applySoftCap(500, 36)).toBe(36);
  });

  it('splits an earn that crosses the cap', () => {
    // 1 below the cap in full, floor(9 / 2) above it
    expect(applySoftCap(999, 10)).toBe(5);
  });

  it('halves with integer division at or above the cap', () => {
    expect(applySoftCap(1000, 9)).toBe(4);
    expect(applySoftCap(1500, 1)).toBe(0);
  });

  it('credits in full when landing exactly on the cap', () => {
    expect(applySoftCap(990, 10)).toBe(10);
  });
});

describe('soft cap helpers', () => {
  it('reports progress toward the cap', () => {
    expect(softCapPercentage({ currentXP: 250 })).toBe(25);
    expect(softCapPercentage({ currentXP: 2500 })).toBe(100);
    expect(isAtSoftCap({ currentXP: 999 })).toBe(false);
    expect(isAtSoftCap({ currentXP: 1000 })).toBe(true);
  });
});
