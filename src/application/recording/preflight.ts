import type { ToolProbePort } from '@/ports/ToolProbePort';

export type ToolCheck = {
  name: string;
  command: string;
  available: boolean;
};

export type PreflightReport = {
  ok: boolean;
  checks: ToolCheck[];
  missing: string[];
};

export type RequiredTool = {
  name: string;
  command: string;
};

/** Resolves every external tool a recording needs; duplicates are probed once. */
export async function runPreflight(
  probe: ToolProbePort,
  tools: readonly RequiredTool[],
): Promise<PreflightReport> {
  const cache = new Map<string, Promise<boolean>>();
  const checks = await Promise.all(
    tools.map(async (tool): Promise<ToolCheck> => {
      let pending = cache.get(tool.command);
      if (!pending) {
        pending = probe.isAvailable(tool.command).catch(() => false);
        cache.set(tool.command, pending);
      }
      return { ...tool, available: await pending };
    }),
  );
  const missing = checks.filter((check) => !check.available).map((check) => check.name);
  return { ok: missing.length === 0, checks, missing };
}
