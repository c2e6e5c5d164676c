import { planGoal, resolveDeadline } from '../../planner/goalPlanner';
import { InvalidDeadlineError, InvalidInputError } from '../../utils/errors';
import { comfortableGoal, fixedNow, sixMonthGoal } from '../fixtures/goals';

describe('planGoal', () => {
  it('should plan a goal the current surplus cannot cover', () => {
    const plan = planGoal(sixMonthGoal, { now: fixedNow });

    expect(plan.monthsRemaining).toBe(6);
    expect(plan.requiredMonthlySaving).toBeCloseTo(4166.67, 2);
    expect(plan.feasible).toBe(false);
    expect(plan.shortfall).toBeCloseTo(1166.67, 2);
    expect(plan.remainingAmount).toBe(25000);
    expect(plan.deadline).toBe('2027-04-18');
  });

  it('should plan a goal the current surplus covers', () => {
    const plan = planGoal(comfortableGoal, { now: fixedNow });

    expect(plan.feasible).toBe(true);
    expect(plan.shortfall).toBe(0);
  });

  it('should treat a surplus equal to the requirement as feasible', () => {
    const plan = planGoal(
      { targetAmount: 1200, deadline: { months: 12 }, currentMonthlySurplus: 100 },
      { now: fixedNow }
    );

    expect(plan.requiredMonthlySaving).toBe(100);
    expect(plan.feasible).toBe(true);
    expect(plan.shortfall).toBe(0);
  });

  it('should count a negative surplus fully in the shortfall', () => {
    const plan = planGoal(
      { targetAmount: 1200, deadline: { months: 12 }, currentMonthlySurplus: -50 },
      { now: fixedNow }
    );

    expect(plan.feasible).toBe(false);
    expect(plan.shortfall).toBe(150);
  });

  it('should keep feasible consistent with surplus >= required', () => {
    for (const surplus of [-1000, 0, 4166, 4167, 5000]) {
      const plan = planGoal({ ...sixMonthGoal, currentMonthlySurplus: surplus }, { now: fixedNow });

      expect(plan.feasible).toBe(surplus >= plan.requiredMonthlySaving);
      expect(plan.shortfall).toBe(Math.max(0, plan.requiredMonthlySaving - surplus));
    }
  });

  it('should subtract savings already set aside', () => {
    const plan = planGoal({ ...sixMonthGoal, currentSavings: 10000 }, { now: fixedNow });

    expect(plan.remainingAmount).toBe(15000);
    expect(plan.requiredMonthlySaving).toBe(2500);
    expect(plan.feasible).toBe(true);
  });

  it('should require nothing once savings reach the target', () => {
    const plan = planGoal({ ...sixMonthGoal, currentSavings: 30000 }, { now: fixedNow });

    expect(plan.remainingAmount).toBe(0);
    expect(plan.requiredMonthlySaving).toBe(0);
    expect(plan.feasible).toBe(true);
  });

  it('should accept calendar dates', () => {
    expect(planGoal({ ...sixMonthGoal, deadline: '2027-04-18' }, { now: fixedNow }).monthsRemaining).toBe(6);
    expect(planGoal({ ...sixMonthGoal, deadline: '2027-04-19' }, { now: fixedNow }).monthsRemaining).toBe(7);
  });

  it('should plan a deadline later today', () => {
    const plan = planGoal(
      { targetAmount: 1000, deadline: new Date(Date.UTC(2026, 9, 18, 18)), currentMonthlySurplus: 2000 },
      { now: fixedNow }
    );

    expect(plan.monthsRemaining).toBe(1);
    expect(plan.requiredMonthlySaving).toBe(1000);
    expect(plan.feasible).toBe(true);
    expect(plan.deadline).toBe('2026-10-18');
  });

  it('should fail for a deadline in the past', () => {
    expect(() => planGoal({ ...sixMonthGoal, deadline: '2026-10-17' }, { now: fixedNow })).toThrow(
      InvalidDeadlineError
    );
  });

  it('should read the clock when no reference time is given', () => {
    expect(planGoal({ ...sixMonthGoal, deadline: { months: 2 } }).monthsRemaining).toBe(2);
    expect(() => planGoal({ ...sixMonthGoal, deadline: '2000-01-01' })).toThrow(InvalidDeadlineError);
  });

  it('should return identical plans for identical input', () => {
    const first = planGoal(sixMonthGoal, { now: fixedNow });
    const second = planGoal(sixMonthGoal, { now: fixedNow });

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  describe('input validation', () => {
    it('should reject a target that is not positive', () => {
      expect(() => planGoal({ ...sixMonthGoal, targetAmount: 0 }, { now: fixedNow })).toThrow(InvalidInputError);
      expect(() => planGoal({ ...sixMonthGoal, targetAmount: -5 }, { now: fixedNow })).toThrow(InvalidInputError);
      expect(() => planGoal({ ...sixMonthGoal, targetAmount: Number.NaN }, { now: fixedNow })).toThrow(
        InvalidInputError
      );
    });

    it('should reject a non-finite surplus', () => {
      expect(() =>
        planGoal({ ...sixMonthGoal, currentMonthlySurplus: Number.POSITIVE_INFINITY }, { now: fixedNow })
      ).toThrow(InvalidInputError);
    });

    it('should reject negative current savings', () => {
      expect(() => planGoal({ ...sixMonthGoal, currentSavings: -1 }, { now: fixedNow })).toThrow(InvalidInputError);
    });
  });
});

describe('resolveDeadline', () => {
  it('should round a fractional duration up', () => {
    expect(resolveDeadline({ months: 0.3 }, fixedNow).monthsRemaining).toBe(1);
    expect(resolveDeadline({ months: 2.1 }, fixedNow).monthsRemaining).toBe(3);
  });

  it('should resolve a duration to the date it ends on', () => {
    expect(resolveDeadline({ months: 3 }, fixedNow).date.toISOString()).toBe('2027-01-18T00:00:00.000Z');
  });

  it('should reject a duration that is not positive', () => {
    expect(() => resolveDeadline({ months: 0 }, fixedNow)).toThrow(InvalidDeadlineError);
    expect(() => resolveDeadline({ months: -2 }, fixedNow)).toThrow(InvalidDeadlineError);
    expect(() => resolveDeadline({ months: Number.NaN }, fixedNow)).toThrow(InvalidDeadlineError);
  });

  it('should count a deadline days away as one month', () => {
    expect(resolveDeadline('2026-10-19', fixedNow).monthsRemaining).toBe(1);
    expect(resolveDeadline('2026-10-28', fixedNow).monthsRemaining).toBe(1);
  });

  it('should reject a deadline of today', () => {
    expect(() => resolveDeadline('2026-10-18', fixedNow)).toThrow(
      'Deadline 2026-10-18 must be after 2026-10-18'
    );
  });

  it('should accept Date objects and timestamps', () => {
    expect(resolveDeadline(new Date(Date.UTC(2026, 11, 25)), fixedNow).monthsRemaining).toBe(3);
    expect(resolveDeadline('2026-11-18T09:00:00Z', fixedNow).monthsRemaining).toBe(1);
  });

  it('should count a timestamp later the same day as one month', () => {
    const sixHoursLater = new Date(fixedNow.getTime() + 6 * 60 * 60 * 1000);

    expect(resolveDeadline(sixHoursLater, fixedNow)).toEqual({
      monthsRemaining: 1,
      date: new Date(Date.UTC(2026, 9, 18)),
    });
    expect(resolveDeadline('2026-10-18T18:00:00Z', fixedNow).monthsRemaining).toBe(1);
  });

  it('should reject a timestamp that has already passed', () => {
    const anHourAgo = new Date(fixedNow.getTime() - 60 * 60 * 1000);

    expect(() => resolveDeadline(anHourAgo, fixedNow)).toThrow(
      'Deadline 2026-10-18T11:00:00.000Z must be after 2026-10-18T12:00:00.000Z'
    );
    expect(() => resolveDeadline(fixedNow, fixedNow)).toThrow(InvalidDeadlineError);
  });

  it('should keep the calendar date written in an offset timestamp', () => {
    const resolved = resolveDeadline('2026-11-01T00:00:00+05:30', fixedNow);

    expect(resolved.date.toISOString()).toBe('2026-11-01T00:00:00.000Z');
    expect(resolved.monthsRemaining).toBe(1);
  });

  it('should reject unreadable dates', () => {
    expect(() => resolveDeadline('not a date', fixedNow)).toThrow(InvalidDeadlineError);
    expect(() => resolveDeadline('2027-02-31', fixedNow)).toThrow(InvalidDeadlineError);
    expect(() => resolveDeadline(new Date(Number.NaN), fixedNow)).toThrow(InvalidDeadlineError);
  });

  it('should count month ends without overshooting', () => {
    const endOfJanuary = new Date(Date.UTC(2027, 0, 31));

    expect(resolveDeadline('2027-02-28', endOfJanuary).monthsRemaining).toBe(1);
    expect(resolveDeadline('2027-03-01', endOfJanuary).monthsRemaining).toBe(2);
  });
});
