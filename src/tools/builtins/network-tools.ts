/**
 * Network tools - fetch a web page as Markdown, or evaluate a script
 * against one.
 */

import { z } from "zod";
import TurndownService from "turndown";
import { JSDOM } from "jsdom";
import { errorToString } from "../../infra/errors.ts";
import { defineTool, ToolCategory } from "../types.ts";

export const MAX_CONTENT_LENGTH = 100_000;

const turndownService = new TurndownService({ headingStyle: "atx", codeBlockStyle: "fenced" });

/**
 * Strip non-content tags and convert the rest to Markdown.
 * Regex-based; turndown copes with whatever structure is left.
 */
export function htmlToMarkdown(html: string): string {
  const cleaned = html
    .replace(/<script[\s\S]*?<\/script>/gi, "")
    .replace(/<style[\s\S]*?<\/style>/gi, "")
    .replace(/<nav[\s\S]*?<\/nav>/gi, "")
    .replace(/<footer[\s\S]*?<\/footer>/gi, "");
  return turndownService.turndown(cleaned);
}

// ── web_request ─────────────────────────────────

export const web_request = defineTool({
  name: "web_request",
  description:
    "Make an HTTP GET request to a URL. HTML pages are returned as Markdown, other content as-is.",
  category: ToolCategory.NETWORK,
  parameters: z.object({
    url: z.string().url().describe("The URL to request"),
    headers: z.record(z.string(), z.string()).optional().describe("Request headers"),
  }),
  async execute({ url, headers }) {
    const response = await fetch(url, {
      method: "GET",
      headers: headers ?? {},
      redirect: "follow",
    });

    const rawBody = await response.text();
    if (!response.ok) {
      return `Request to ${url} failed with status ${response.status} ${response.statusText}.`;
    }

    const contentType = response.headers.get("content-type") ?? "";
    let body = contentType.includes("text/html") ? htmlToMarkdown(rawBody) : rawBody;

    if (body.length > MAX_CONTENT_LENGTH) {
      body = body.slice(0, MAX_CONTENT_LENGTH) + `\n\n[Content truncated, original length: ${rawBody.length} chars]`;
    }

    return `Status: ${response.status}\n\n${body}`;
  },
});

// ── run_js ──────────────────────────────────────

/**
 * Load a page into jsdom and evaluate `script` in its window. The page's own
 * scripts do not run and nothing is rendered; DOM queries work, layout does not.
 */
export const run_js = defineTool({
  name: "run_js",
  description:
    "Run JavaScript code on a webpage. The page is loaded without running its own scripts; " +
    "the value of the last expression is returned.",
  category: ToolCategory.NETWORK,
  parameters: z.object({
    url: z.string().url().describe("The URL of the webpage to run the JavaScript on."),
    script: z.string().min(1).describe("The JavaScript code to run on the webpage."),
  }),
  async execute({ url, script }) {
    const response = await fetch(url, { method: "GET", redirect: "follow" });
    const html = await response.text();
    if (!response.ok) {
      return `Request to ${url} failed with status ${response.status} ${response.statusText}.`;
    }

    const dom = new JSDOM(html, { url, runScripts: "outside-only" });
    try {
      const value: unknown = dom.window.eval(script);
      const text = typeof value === "string" ? value : JSON.stringify(value) ?? String(value);
      return `JavaScript result:\n\`\`\`\n${text}\n\`\`\``;
    } catch (err) {
      return `Error occurred: ${errorToString(err)}`;
    } finally {
      dom.window.close();
    }
  },
});
