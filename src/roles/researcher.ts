import { current_time, read_file, run_js, web_request, write_file } from "../tools/builtins/index.ts";
import type { Role } from "./types.ts";

export const researcher: Role = {
  name: "Researcher",
  identity:
    "A dedicated researcher with specialized tools for web research, data analysis, and documentation.",
  tools: [web_request, run_js, read_file, write_file, current_time],
};
