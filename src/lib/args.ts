import { z } from "zod";

const Day = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

const RunArgsSchema = z.object({
  start: Day.optional(),
  end: Day.optional(),
  out: z.string().min(1).optional(),
  currencies: z
    .string()
    .regex(/^[A-Za-z0-9]+(,[A-Za-z0-9]+)*$/, "expected comma-separated codes, e.g. BTC,ETH")
    .optional(),
});

export type RunArgs = z.infer<typeof RunArgsSchema>;

/** `--key=value` pairs; anything else is ignored. */
export function parseArgs(argv: string[]): RunArgs {
  const raw: Record<string, string> = {};
  for (const arg of argv) {
    const m = /^--([a-z][a-z-]*)=(.*)$/.exec(arg);
    if (m) raw[m[1]] = m[2];
  }
  return RunArgsSchema.parse(raw);
}

export type DateWindow = { startDate: string; endDate: string };

export function resolveWindow(args: RunArgs, defaults: DateWindow): DateWindow {
  const startDate = args.start ?? defaults.startDate;
  const endDate = args.end ?? defaults.endDate;
  if (startDate > endDate) {
    throw new Error(`start date ${startDate} is after end date ${endDate}`);
  }
  return { startDate, endDate };
}
