import { AsyncLocalStorage } from "node:async_hooks";

export interface AcquisitionContext {
  run_id: string;
  target_name: string | null;
  strategy: string | null;
  phase: number | null;
  attempt: number | null;
}

const storage = new AsyncLocalStorage<AcquisitionContext>();

export const getAcquisitionContext = (): AcquisitionContext | undefined => storage.getStore();

/** Runs `fn` with the current context overlaid by `patch`. */
export const withAcquisitionContext = <T>(patch: Partial<AcquisitionContext>, fn: () => T): T => {
  const parent = storage.getStore();
  const context: AcquisitionContext = {
    run_id: patch.run_id ?? parent?.run_id ?? "local",
    target_name: patch.target_name !== undefined ? patch.target_name : (parent?.target_name ?? null),
    strategy: patch.strategy !== undefined ? patch.strategy : (parent?.strategy ?? null),
    phase: patch.phase !== undefined ? patch.phase : (parent?.phase ?? null),
    attempt: patch.attempt !== undefined ? patch.attempt : (parent?.attempt ?? null),
  };
  return storage.run(context, fn);
};
