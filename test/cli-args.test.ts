import { describe, test, expect } from "vitest";
import {
  parseAuditArgs,
  parseMigrationArgs,
  parseOptionArgs,
  parsePatternList,
} from "../src/cli-args.ts";
import { UsageError } from "../src/errors.ts";

describe("parseOptionArgs", () => {
  test("supports --key=value, --key value and bare flags", () => {
    const parsed = parseOptionArgs(["--project", "Contoso", "--dry-run", "--pat=abc=def", "extra"]);

    expect(parsed.options).toEqual({ project: "Contoso", "dry-run": true, pat: "abc=def" });
    expect(parsed.positionals).toEqual(["extra"]);
  });

  test("rejects an option given more than once", () => {
    expect(() =>
      parseOptionArgs(["--build-pipeline-patterns=web-*", "--build-pipeline-patterns", "api-*"]),
    ).toThrow(new UsageError("Option --build-pipeline-patterns was given more than once."));
  });

  test("accepts options named like object members", () => {
    expect(parseOptionArgs(["--constructor=x"]).options).toEqual({ constructor: "x" });
  });
});

describe("parsePatternList", () => {
  test("distinguishes unset, explicitly empty and provided", () => {
    expect(parsePatternList(undefined)).toEqual({ kind: "unset" });
    expect(parsePatternList(true)).toEqual({ kind: "empty" });
    expect(parsePatternList("")).toEqual({ kind: "empty" });
    expect(parsePatternList(" , ")).toEqual({ kind: "empty" });
    expect(parsePatternList("web-*, api-*")).toEqual({
      kind: "provided",
      patterns: ["web-*", "api-*"],
    });
  });
});

describe("parseAuditArgs", () => {
  test("parses connection settings and an explicitly empty pattern list", () => {
    const parsed = parseAuditArgs([
      "--organization=contoso",
      "--config",
      "team.json",
      "--build-pipeline-patterns=",
    ]);

    expect(parsed.help).toBe(false);
    expect(parsed.settings).toEqual({
      organizationName: "contoso",
      projectName: undefined,
      pat: undefined,
      configPath: "team.json",
      buildPipelinePatterns: { kind: "empty" },
    });
  });

  test("leaves the pattern list unset when the flag is absent", () => {
    expect(parseAuditArgs([]).settings.buildPipelinePatterns).toEqual({ kind: "unset" });
  });

  test("rejects unknown options", () => {
    expect(() => parseAuditArgs(["--team=Web"])).toThrow(UsageError);
    expect(() => parseAuditArgs(["--bogus"])).toThrow(/Unknown option: --bogus/);
  });

  test("rejects positional arguments", () => {
    expect(() => parseAuditArgs(["stray"])).toThrow(/Unexpected argument: stray/);
  });
});

describe("parseMigrationArgs", () => {
  test("parses sprints, team and dry run", () => {
    const parsed = parseMigrationArgs([
      "--source-sprint",
      "Sprint 1",
      "--destination-sprint=Sprint 2",
      "--team",
      "Web Team",
      "--dry-run",
    ]);

    expect(parsed.sourceSprintName).toBe("Sprint 1");
    expect(parsed.destinationSprintName).toBe("Sprint 2");
    expect(parsed.settings.teamName).toBe("Web Team");
    expect(parsed.dryRun).toBe(true);
    expect(parsed.help).toBe(false);
  });

  test("requires both sprint names", () => {
    expect(() => parseMigrationArgs(["--source-sprint=Sprint 1"])).toThrow(
      /Both --source-sprint and --destination-sprint are required/,
    );
    expect(() => parseMigrationArgs(["--source-sprint=Sprint 1", "--destination-sprint="])).toThrow(
      UsageError,
    );
  });

  test("allows --help without sprint names", () => {
    const parsed = parseMigrationArgs(["--help"]);
    expect(parsed.help).toBe(true);
    expect(parsed.sourceSprintName).toBe("");
  });

  test("does not accept the pattern option", () => {
    expect(() =>
      parseMigrationArgs([
        "--source-sprint=A",
        "--destination-sprint=B",
        "--build-pipeline-patterns=web-*",
      ]),
    ).toThrow(/Unknown option: --build-pipeline-patterns/);
  });
});
