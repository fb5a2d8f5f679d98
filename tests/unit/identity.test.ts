import { describe, expect, test } from "vitest";
import { buildIdentitySection, buildSystemPrompt } from "../../src/identity/prompt.ts";
import { ROLES, collectRoleTools, resolveRoles } from "../../src/roles/index.ts";
import type { Role } from "../../src/roles/types.ts";
import { ConfigError } from "../../src/infra/errors.ts";
import { current_time, read_file } from "../../src/tools/builtins/index.ts";

describe("roles", () => {
  test("resolveRoles is case-insensitive", () => {
    expect(resolveRoles(["Researcher"])).toEqual([ROLES["researcher"]]);
  });

  test("unknown roles are a configuration error", () => {
    expect(() => resolveRoles(["pirate"])).toThrow(ConfigError);
    expect(() => resolveRoles(["pirate"])).toThrow('Unknown role "pirate". Available roles: researcher');
  });

  test("researcher carries the research tools", () => {
    const names = resolveRoles(["researcher"]).flatMap((r) => r.tools.map((t) => t.name));
    expect(names).toEqual(["web_request", "run_js", "read_file", "write_file", "current_time"]);
  });

  test("collectRoleTools drops duplicate names", () => {
    const a: Role = { name: "A", identity: "a", tools: [current_time, read_file] };
    const b: Role = { name: "B", identity: "b", tools: [read_file] };
    expect(collectRoleTools([a, b]).map((t) => t.name)).toEqual(["current_time", "read_file"]);
  });
});

describe("buildSystemPrompt", () => {
  test("identity section without roles is one line", () => {
    expect(buildIdentitySection("Simmy", [])).toEqual(["You are Simmy, a helpful assistant."]);
  });

  test("lists each role", () => {
    const prompt = buildSystemPrompt("Simmy", resolveRoles(["researcher"]));
    const lines = prompt.split("\n");

    expect(lines[0]).toBe("You are Simmy, a helpful assistant.");
    expect(lines).toContain("## Roles");
    expect(lines).toContain(
      "- Researcher: A dedicated researcher with specialized tools for web research, data analysis, and documentation.",
    );
    expect(lines).toContain("## Tasks");
    expect(lines).toContain("## Responding");
  });
});
