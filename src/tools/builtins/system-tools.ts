/**
 * System tools - time.
 */

import { z } from "zod";
import { defineTool, ToolCategory } from "../types.ts";
import { formatTimestamp } from "../../infra/time.ts";

// ── current_time ─────────────────────────────────

export const current_time = defineTool({
  name: "current_time",
  description: "Get the current date and time",
  category: ToolCategory.SYSTEM,
  parameters: z.object({
    timezone: z.string().optional().describe("IANA timezone (e.g., 'UTC', 'America/New_York')"),
  }),
  async execute({ timezone }) {
    const now = new Date();
    const iso = now.toISOString();

    if (!timezone) {
      return `Current time: ${formatTimestamp(now.getTime())} (local), ${iso} (UTC)`;
    }

    try {
      const formatted = now.toLocaleString("en-US", { timeZone: timezone });
      return `Current time in ${timezone}: ${formatted} (${iso} UTC)`;
    } catch {
      // toLocaleString throws RangeError for an unknown zone
      return `Unknown timezone "${timezone}". Current time: ${iso} (UTC)`;
    }
  },
});
