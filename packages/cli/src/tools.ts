import type { AskHuman } from "@tether/core";
import { createAskHumanTool, defineTool, Toolkit } from "@tether/core";
import { z } from "zod";
import { createCalculatorTool } from "./calculator";

export interface BuildToolsOptions {
  /** Registers ask_human when set. */
  ask?: AskHuman;
  now?: () => Date;
}

export function createCurrentTimeTool(now: () => Date = () => new Date()) {
  return defineTool({
    name: "get_current_time",
    doc: `Get the current date and time.

@param timezone - IANA time zone name such as "Europe/Paris". Defaults to UTC.`,
    parameters: z.object({ timezone: z.string().optional() }),
    execute({ timezone }) {
      const date = now();
      const timeZone = timezone ?? "UTC";
      // Throws RangeError for unknown zones, reported back to the model
      const local = date.toLocaleString("en-US", { timeZone, dateStyle: "full", timeStyle: "long" });
      return { iso: date.toISOString(), timezone: timeZone, local };
    },
  });
}

export function buildToolkit(options: BuildToolsOptions = {}): Toolkit {
  const toolkit = new Toolkit();
  toolkit.register(createCurrentTimeTool(options.now));
  toolkit.register(createCalculatorTool());
  if (options.ask) {
    toolkit.register(createAskHumanTool(options.ask));
  }
  return toolkit;
}
