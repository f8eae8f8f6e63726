import { describe, it, expect } from 'vitest';
import React from 'react';
import { render } from 'ink-testing-library';
import { ProgressBar } from '../../../src/ui/components/ProgressBar.js';

describe('ProgressBar', () => {
  const FILLED_CHAR = '█'; // Full block character
  const EMPTY_CHAR = '░'; // Light shade character

  const count = (frame: string | undefined, char: string): number =>
    (frame?.match(new RegExp(char, 'g')) || []).length;

  describe('progress rendering', () => {
    it('should render 0% progress', () => {
      const { lastFrame } = render(<ProgressBar progress={0} width={10} />);
      const frame = lastFrame();
      expect(frame).toContain('0%');
      expect(count(frame, FILLED_CHAR)).toBe(0);
      expect(count(frame, EMPTY_CHAR)).toBe(10);
    });

    it('should render 50% progress', () => {
      const { lastFrame } = render(<ProgressBar progress={0.5} width={10} />);
      const frame = lastFrame();
      expect(frame).toContain('50%');
      expect(count(frame, FILLED_CHAR)).toBe(5);
      expect(count(frame, EMPTY_CHAR)).toBe(5);
    });

    it('should render 100% progress', () => {
      const { lastFrame } = render(<ProgressBar progress={1} width={10} />);
      const frame = lastFrame();
      expect(frame).toContain('100%');
      expect(count(frame, FILLED_CHAR)).toBe(10);
    });

    it('should not read 100% until every piece is in', () => {
      const { lastFrame } = render(<ProgressBar progress={0.999} width={10} />);
      expect(lastFrame()).toContain(' 99%');
    });
  });

  describe('percentage text', () => {
    it('should show percentage text by default', () => {
      const { lastFrame } = render(<ProgressBar progress={0.25} width={10} />);
      expect(lastFrame()).toContain('25%');
    });

    it('should hide percentage text when showPercentage is false', () => {
      const { lastFrame } = render(<ProgressBar progress={0.5} width={10} showPercentage={false} />);
      expect(lastFrame()).not.toContain('%');
    });

    it('should pad percentage text to 3 characters', () => {
      const { lastFrame } = render(<ProgressBar progress={0.05} width={10} />);
      expect(lastFrame()).toContain('  5%');
    });
  });

  describe('width prop', () => {
    it('should use a default width of 20', () => {
      const { lastFrame } = render(<ProgressBar progress={1} />);
      expect(count(lastFrame(), FILLED_CHAR)).toBe(20);
    });

    it('should respect a custom width', () => {
      const { lastFrame } = render(<ProgressBar progress={1} width={5} />);
      expect(count(lastFrame(), FILLED_CHAR)).toBe(5);
    });
  });

  describe('edge cases', () => {
    it('should clamp progress below 0', () => {
      const { lastFrame } = render(<ProgressBar progress={-0.5} width={10} />);
      expect(lastFrame()).toContain('  0%');
    });

    it('should clamp progress above 1', () => {
      const { lastFrame } = render(<ProgressBar progress={1.5} width={10} />);
      expect(lastFrame()).toContain('100%');
    });

    it('should treat NaN as no progress', () => {
      const { lastFrame } = render(<ProgressBar progress={Number.NaN} width={10} />);
      expect(count(lastFrame(), FILLED_CHAR)).toBe(0);
    });
  });
});
