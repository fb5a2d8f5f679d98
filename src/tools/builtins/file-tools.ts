/**
 * File tools - read and write files with path security.
 */

import { z } from "zod";
import path from "node:path";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { defineTool, isPathAllowed, normalizePath, ToolCategory, type ToolContext } from "../types.ts";
import { ToolPermissionError } from "../errors.ts";

function checkAllowed(toolName: string, filePath: string, context: ToolContext): void {
  const allowedPaths = context.allowedPaths;
  if (allowedPaths && allowedPaths.length > 0 && !isPathAllowed(filePath, allowedPaths)) {
    throw new ToolPermissionError(toolName, `Path "${filePath}" is not in allowed paths`);
  }
}

// ── read_file ──────────────────────────────────

export const read_file = defineTool({
  name: "read_file",
  description: "Read the content of a text file",
  category: ToolCategory.FILE,
  parameters: z.object({
    path: z.string().describe("File path to read"),
    offset: z.coerce.number().int().min(0).optional().describe("Start reading from this line number (0-based)"),
    limit: z.coerce.number().int().positive().optional().describe("Maximum number of lines to return"),
  }),
  async execute({ path: originalPath, offset, limit }, context) {
    checkAllowed("read_file", originalPath, context);

    const filePath = normalizePath(originalPath);
    const content = await readFile(filePath, "utf-8");

    if (offset === undefined && limit === undefined) {
      return content;
    }

    const lines = content.split("\n");
    const start = offset ?? 0;
    const end = limit !== undefined ? start + limit : lines.length;
    const sliced = lines.slice(start, end).join("\n");
    return end < lines.length
      ? `${sliced}\n[Showing lines ${start}-${end - 1} of ${lines.length}]`
      : sliced;
  },
});

// ── write_file ─────────────────────────────────

export const write_file = defineTool({
  name: "write_file",
  description: "Write content to a file, replacing it if it exists",
  category: ToolCategory.FILE,
  parameters: z.object({
    path: z.string().describe("File path to write"),
    content: z.string().describe("Content to write"),
  }),
  async execute({ path: originalPath, content }, context) {
    checkAllowed("write_file", originalPath, context);

    const filePath = normalizePath(originalPath);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content, "utf-8");

    return `Wrote ${Buffer.byteLength(content, "utf-8")} bytes to ${filePath}.`;
  },
});
