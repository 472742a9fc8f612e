import fs from "node:fs";
import { z } from "zod";
import { IndicatorSpec } from "./resolver";

const indicatorSchema = z
  .object({
    indicator: z.string().trim().min(1),
    category: z.string().optional(),
    keywords: z.array(z.string().min(1)).optional(),
    expectedRange: z
      .tuple([z.number(), z.number()])
      .refine(([min, max]) => min <= max, { message: "expectedRange must be [min, max] with min <= max" })
      .optional(),
  })
  .strict();

const indicatorsFileSchema = z.array(indicatorSchema);

export function parseIndicators(raw: unknown, source = "indicators"): IndicatorSpec[] {
  const parsed = indicatorsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
    throw new Error(`Invalid ${source}: ${issues}`);
  }
  return parsed.data;
}

export function loadIndicators(filePath: string): IndicatorSpec[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Indicators file not found: ${filePath}`);
  }
  return parseIndicators(JSON.parse(fs.readFileSync(filePath, "utf-8")), filePath);
}
