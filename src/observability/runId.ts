import crypto from "node:crypto";

/** Run ids sort by start time: `run_<slug>_<iso>_<suffix>`. */
export function createRunId(scope: string, now = new Date()): string {
  const slug = scope.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-+|-+$/g, "") || "all";
  const suffix = crypto.randomBytes(3).toString("hex");
  return `run_${slug}_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}
