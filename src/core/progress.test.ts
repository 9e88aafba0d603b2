import { describe, it, expect } from 'vitest';
import { ProgressReporter } from './progress';

function createReporter(total = 0) {
  const lines: string[] = [];
  const reporter = new ProgressReporter(total, { silent: true, log: (line) => lines.push(line) });
  return { lines, reporter };
}

describe('ProgressReporter', () => {
  it('starts from the given total', () => {
    const { reporter } = createReporter(3);
    expect(reporter.state).toEqual({ total: 3, completed: 0 });
  });

  it('lets the total grow while completions come in', () => {
    const { reporter } = createReporter();
    reporter.start();
    reporter.addTotal();
    reporter.addTotal();
    reporter.increment();
    reporter.addTotal();
    expect(reporter.state).toEqual({ total: 3, completed: 1 });

    reporter.setTotal(3);
    reporter.increment();
    reporter.increment();
    expect(reporter.state).toEqual({ total: 3, completed: 3 });
  });

  it('never counts past a final total', () => {
    const { reporter } = createReporter();
    reporter.setTotal(1);
    reporter.increment();
    expect(() => reporter.increment()).toThrow(RangeError);
    expect(reporter.state).toEqual({ total: 1, completed: 1 });
  });

  it('rejects a final total below the completed count', () => {
    const { reporter } = createReporter(2);
    reporter.increment();
    reporter.increment();
    expect(() => reporter.setTotal(1)).toThrow(RangeError);
  });

  it('rejects growth once the total is final', () => {
    const { reporter } = createReporter();
    reporter.setTotal(0);
    expect(() => reporter.addTotal()).toThrow(RangeError);
  });

  it('prints each failure at once without touching the counters', () => {
    const { lines, reporter } = createReporter(2);
    reporter.start();
    reporter.reportFailure('/out/B.php: No result received');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('/out/B.php: No result received');
    expect(reporter.failures).toEqual(['/out/B.php: No result received']);
    expect(reporter.state).toEqual({ total: 2, completed: 0 });
  });

  it('finishes with or without failures', () => {
    const { reporter } = createReporter(1);
    reporter.start();
    reporter.reportFailure('/out/A.php: boom');
    reporter.increment();
    expect(() => reporter.finish()).not.toThrow();
  });
});
