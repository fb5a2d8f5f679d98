/**
 * Built-in tools.
 */

export { current_time } from "./system-tools.ts";
export { read_file, write_file } from "./file-tools.ts";
export { run_js, web_request } from "./network-tools.ts";
export { createTaskTools } from "./task-tools.ts";
