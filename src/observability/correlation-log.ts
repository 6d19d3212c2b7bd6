import type { log } from "apify";
import { isRecord } from "../acquisition/strategies/payload";
import { getAcquisitionContext, type AcquisitionContext } from "./acquisition-context";

type ApifyLog = typeof log;

const installed = new WeakSet<ApifyLog>();

const contextFields = (ctx: AcquisitionContext): Record<string, unknown> => {
  const fields: Record<string, unknown> = { run_id: ctx.run_id };
  if (ctx.target_name !== null) fields.target_name = ctx.target_name;
  if (ctx.strategy !== null) fields.strategy = ctx.strategy;
  if (ctx.phase !== null) fields.phase = ctx.phase;
  if (ctx.attempt !== null) fields.attempt = ctx.attempt;
  return fields;
};

export const enrichLogData = (data: unknown, ctx: AcquisitionContext | undefined): unknown => {
  if (!ctx) return data;
  if (data === undefined || data === null) return contextFields(ctx);
  if (isRecord(data)) return { ...contextFields(ctx), ...data };
  return data;
};

/**
 * Routes every record of `target` through the acquisition context so log lines
 * emitted inside a target's work carry its run, target, strategy, phase and
 * attempt. All level methods funnel into `internal`, so that is the one hook.
 */
export const installCorrelationLogging = (target: ApifyLog, enabled: boolean): void => {
  if (!enabled || installed.has(target)) return;
  installed.add(target);

  const internal = target.internal.bind(target);
  target.internal = (level, message, data, exception) =>
    internal(level, message, enrichLogData(data, getAcquisitionContext()), exception);
};
