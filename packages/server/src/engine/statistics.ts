/**
 * Statistics aggregator: labour and activity totals by day, area and
 * contractor. Read-only; each call works from one range query and one set of
 * contractor lookup maps.
 *
 * Contractor figures use attribution: an activity with N resolved
 * contractors counts its full labour against each of them.
 */

import type { ActivityRepo } from "../site-db/activity-repo.js";
import type { BriefingStore } from "./briefing-store.js";
import type { ContractorRegistry } from "./contractor-registry.js";
import { ROLLING_WINDOW_DAYS, UNASSIGNED_CONTRACTOR } from "../config/site.js";
import { ValidationError } from "./errors.js";
import { addDays, daysBetween, enumerateDates, weekBounds } from "./calendar.js";
import { resolveActivities } from "./contractor-resolution.js";
import { contractorNameKey } from "./fields.js";
import { toActivity } from "./activity-store.js";
import type { RequestContext, ResolvedActivity } from "./types.js";

/** Longest rolling window accepted */
export const MAX_ROLLING_WINDOW_DAYS = 366;

/** Longest date range accepted by rangeTotals */
export const MAX_RANGE_DAYS = 366;

export interface AreaTotal {
  area: string | null;
  labor: number;
  activities: number;
}

export interface ContractorTotal {
  contractor_id: number;
  name: string;
  trade: string;
  labor: number;
  activities: number;
}

export interface DailyTotals {
  date: string;
  total_labor: number;
  total_activities: number;
  total_unique_contractors: number;
  by_area: AreaTotal[];
  by_contractor: ContractorTotal[];
  active_contractors: number;
}

export interface DailySeriesEntry {
  date: string;
  labor: number;
  activities: number;
}

export interface ContractorBreakdownRow {
  date: string;
  activity_id: number;
  contractor_id: number;
  contractor_name: string;
  trade: string;
  area: string | null;
  labor: number;
}

export interface AreaBreakdownRow {
  date: string;
  area: string | null;
  labor: number;
  activities: number;
}

export interface RangeTotalsSummary {
  total_labor: number;
  total_activities: number;
  unique_contractors: number;
  days_in_range: number;
  days_with_data: number;
}

export interface PeriodSummary {
  labor_per_day: number;
  activities_per_day: number;
  days_with_data: number;
}

export interface ContractorSummary {
  contractor_id: number;
  name: string;
  trade: string;
  assignments: number;
  labor: number;
  days_worked: number;
  areas: string[];
}

export interface AreaSummary {
  area: string | null;
  labor: number;
  activities: number;
  days_active: number;
}

export interface RangeTotals {
  start_date: string;
  end_date: string;
  daily_series: DailySeriesEntry[];
  contractor_breakdown: ContractorBreakdownRow[];
  area_breakdown: AreaBreakdownRow[];
  totals: RangeTotalsSummary;
  period_summary: PeriodSummary;
  contractor_summary: ContractorSummary[];
  area_summary: AreaSummary[];
}

export interface RollingDay {
  date: string;
  contractors: Record<string, number>;
}

export interface RollingContractorDaily {
  start_date: string;
  end_date: string;
  window_days: number;
  days: RollingDay[];
}

export interface AreaUsage {
  area: string;
  activity_count: number;
  total_labor: number;
  months_active: number;
  first_used: string;
  last_used: string;
}

/** Activities keyed by their briefing's date, plus the dates that have a briefing */
interface RangeData {
  briefingDates: Set<string>;
  activities: Array<ResolvedActivity & { briefingDate: string }>;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Sort helper for nullable labels; null sorts first */
function compareLabels(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a.localeCompare(b);
}

function totalsByArea(activities: readonly ResolvedActivity[]): AreaTotal[] {
  const byArea = new Map<string | null, AreaTotal>();
  for (const activity of activities) {
    const entry = byArea.get(activity.area) ?? { area: activity.area, labor: 0, activities: 0 };
    entry.labor += activity.laborCount;
    entry.activities += 1;
    byArea.set(activity.area, entry);
  }
  return [...byArea.values()].sort((a, b) => b.labor - a.labor || compareLabels(a.area, b.area));
}

function totalsByContractor(activities: readonly ResolvedActivity[]): ContractorTotal[] {
  const byContractor = new Map<number, ContractorTotal>();
  for (const activity of activities) {
    for (const contractor of activity.contractors) {
      const entry = byContractor.get(contractor.id) ?? {
        contractor_id: contractor.id,
        name: contractor.name,
        trade: contractor.trade,
        labor: 0,
        activities: 0,
      };
      entry.labor += activity.laborCount;
      entry.activities += 1;
      byContractor.set(contractor.id, entry);
    }
  }
  return [...byContractor.values()].sort((a, b) => b.labor - a.labor || a.name.localeCompare(b.name));
}

function countUniqueNames(activities: readonly ResolvedActivity[]): number {
  const names = new Set<string>();
  for (const activity of activities) {
    for (const contractor of activity.contractors) {
      names.add(contractorNameKey(contractor.name));
    }
  }
  return names.size;
}

function emptyRange(startDate: string, endDate: string): RangeTotals {
  return {
    start_date: startDate,
    end_date: endDate,
    daily_series: [],
    contractor_breakdown: [],
    area_breakdown: [],
    totals: { total_labor: 0, total_activities: 0, unique_contractors: 0, days_in_range: 0, days_with_data: 0 },
    period_summary: { labor_per_day: 0, activities_per_day: 0, days_with_data: 0 },
    contractor_summary: [],
    area_summary: [],
  };
}

export class StatisticsAggregator {
  constructor(
    private readonly activities: ActivityRepo,
    private readonly briefings: BriefingStore,
    private readonly registry: ContractorRegistry
  ) {}

  /**
   * Totals for one date. A date without a briefing reports zeros.
   */
  dailyTotals(ctx: RequestContext, date: string): DailyTotals {
    const { activities } = this.loadRange(ctx, date, date);

    return {
      date,
      total_labor: activities.reduce((sum, activity) => sum + activity.laborCount, 0),
      total_activities: activities.length,
      total_unique_contractors: countUniqueNames(activities),
      by_area: totalsByArea(activities),
      by_contractor: totalsByContractor(activities),
      active_contractors: this.registry.countActiveContractors(ctx),
    };
  }

  /**
   * Totals over [startDate, endDate], inclusive. An inverted range yields an
   * empty result; otherwise every date in range has a daily_series entry.
   * Ranges longer than MAX_RANGE_DAYS are a ValidationError.
   */
  rangeTotals(ctx: RequestContext, startDate: string, endDate: string): RangeTotals {
    if (startDate > endDate) {
      return emptyRange(startDate, endDate);
    }
    if (daysBetween(startDate, endDate) + 1 > MAX_RANGE_DAYS) {
      throw new ValidationError(`Date range must not exceed ${MAX_RANGE_DAYS} days`);
    }

    const { briefingDates, activities } = this.loadRange(ctx, startDate, endDate);
    const dates = enumerateDates(startDate, endDate);

    const series = new Map<string, DailySeriesEntry>();
    for (const date of dates) {
      series.set(date, { date, labor: 0, activities: 0 });
    }

    const contractorBreakdown: ContractorBreakdownRow[] = [];
    const areaBreakdown = new Map<string, AreaBreakdownRow>();
    const contractorSummary = new Map<number, ContractorSummary & { dates: Set<string>; areaSet: Set<string> }>();
    const areaSummary = new Map<string | null, AreaSummary & { dates: Set<string> }>();

    for (const activity of activities) {
      const date = activity.briefingDate;
      const day = series.get(date);
      if (day) {
        day.labor += activity.laborCount;
        day.activities += 1;
      }

      const areaKey = `${date}\u0000${activity.area ?? ""}`;
      const areaRow = areaBreakdown.get(areaKey) ?? { date, area: activity.area, labor: 0, activities: 0 };
      areaRow.labor += activity.laborCount;
      areaRow.activities += 1;
      areaBreakdown.set(areaKey, areaRow);

      const areaTotal = areaSummary.get(activity.area) ?? {
        area: activity.area,
        labor: 0,
        activities: 0,
        days_active: 0,
        dates: new Set<string>(),
      };
      areaTotal.labor += activity.laborCount;
      areaTotal.activities += 1;
      areaTotal.dates.add(date);
      areaSummary.set(activity.area, areaTotal);

      for (const contractor of activity.contractors) {
        contractorBreakdown.push({
          date,
          activity_id: activity.id,
          contractor_id: contractor.id,
          contractor_name: contractor.name,
          trade: contractor.trade,
          area: activity.area,
          labor: activity.laborCount,
        });

        const summary = contractorSummary.get(contractor.id) ?? {
          contractor_id: contractor.id,
          name: contractor.name,
          trade: contractor.trade,
          assignments: 0,
          labor: 0,
          days_worked: 0,
          areas: [],
          dates: new Set<string>(),
          areaSet: new Set<string>(),
        };
        summary.assignments += 1;
        summary.labor += activity.laborCount;
        summary.dates.add(date);
        if (activity.area !== null) {
          summary.areaSet.add(activity.area);
        }
        contractorSummary.set(contractor.id, summary);
      }
    }

    const totalLabor = activities.reduce((sum, activity) => sum + activity.laborCount, 0);
    const daysWithData = briefingDates.size;

    return {
      start_date: startDate,
      end_date: endDate,
      daily_series: [...series.values()],
      contractor_breakdown: contractorBreakdown,
      area_breakdown: [...areaBreakdown.values()],
      totals: {
        total_labor: totalLabor,
        total_activities: activities.length,
        unique_contractors: countUniqueNames(activities),
        days_in_range: dates.length,
        days_with_data: daysWithData,
      },
      period_summary: {
        labor_per_day: daysWithData > 0 ? round2(totalLabor / daysWithData) : 0,
        activities_per_day: daysWithData > 0 ? round2(activities.length / daysWithData) : 0,
        days_with_data: daysWithData,
      },
      contractor_summary: [...contractorSummary.values()]
        .map(({ dates: worked, areaSet, ...summary }) => ({
          ...summary,
          days_worked: worked.size,
          areas: [...areaSet].sort((a, b) => a.localeCompare(b)),
        }))
        .sort((a, b) => b.labor - a.labor || a.name.localeCompare(b.name)),
      area_summary: [...areaSummary.values()]
        .map(({ dates: active, ...summary }) => ({ ...summary, days_active: active.size }))
        .sort((a, b) => b.labor - a.labor || compareLabels(a.area, b.area)),
    };
  }

  /**
   * Range totals over the Monday-to-Sunday week containing the date.
   */
  weeklyTotals(ctx: RequestContext, date: string): RangeTotals {
    const { start, end } = weekBounds(date);
    return this.rangeTotals(ctx, start, end);
  }

  /**
   * Labour per contractor name for each day of the window ending on endDate.
   * Days without a briefing report an empty map.
   */
  rollingContractorDaily(
    ctx: RequestContext,
    endDate: string,
    windowDays: number = ROLLING_WINDOW_DAYS
  ): RollingContractorDaily {
    if (!Number.isInteger(windowDays) || windowDays < 1 || windowDays > MAX_ROLLING_WINDOW_DAYS) {
      throw new ValidationError(`Window must be a whole number of days between 1 and ${MAX_ROLLING_WINDOW_DAYS}`);
    }

    const startDate = addDays(endDate, -(windowDays - 1));
    const { activities } = this.loadRange(ctx, startDate, endDate);

    const days = new Map<string, RollingDay>();
    for (const date of enumerateDates(startDate, endDate)) {
      days.set(date, { date, contractors: {} });
    }

    for (const activity of activities) {
      const day = days.get(activity.briefingDate);
      if (!day) continue;

      const names = activity.contractors.length > 0
        ? activity.contractors.map((contractor) => contractor.name)
        : [UNASSIGNED_CONTRACTOR];
      for (const name of names) {
        day.contractors[name] = (day.contractors[name] ?? 0) + activity.laborCount;
      }
    }

    return {
      start_date: startDate,
      end_date: endDate,
      window_days: windowDays,
      days: [...days.values()],
    };
  }

  /**
   * Lifetime usage per named area, busiest first.
   */
  areaUsageStats(ctx: RequestContext): AreaUsage[] {
    return this.activities.areaUsage(ctx.projectId).map((row) => ({
      area: row.area,
      activity_count: row.activityCount,
      total_labor: row.totalLabor,
      months_active: row.monthsActive,
      first_used: row.firstUsed,
      last_used: row.lastUsed,
    }));
  }

  private loadRange(ctx: RequestContext, startDate: string, endDate: string): RangeData {
    const briefingDates = new Set(
      this.briefings.listBriefingsInRange(ctx, startDate, endDate).map((briefing) => briefing.date)
    );
    const rows = this.activities.listInRange(ctx.projectId, startDate, endDate);
    const maps = this.registry.buildLookupMaps(ctx);
    const resolved = resolveActivities(rows.map((row) => toActivity(row.activity)), maps);

    return {
      briefingDates,
      activities: resolved.map((activity, index) => ({
        ...activity,
        briefingDate: rows[index]?.briefingDate ?? activity.date,
      })),
    };
  }
}
