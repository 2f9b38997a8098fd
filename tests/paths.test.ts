/**
 * Unit tests for fingerprints and artifact paths.
 */
import { describe, test, expect } from "vitest";
import {
  artifactKey,
  canonicalPath,
  fingerprint,
  scratchPath,
  slug,
  stageKindSlug,
} from "../src/core/paths.js";

describe("fingerprint", () => {
  test("name-value pairs", () => {
    expect(fingerprint([{ name: "date", value: "2024-05-01" }])).toBe(
      "date-2024-05-01",
    );
  });

  test("independent of declaration order", () => {
    const a = fingerprint([
      { name: "date", value: "2024-05-01" },
      { name: "by", value: "mirror" },
    ]);
    const b = fingerprint([
      { name: "by", value: "mirror" },
      { name: "date", value: "2024-05-01" },
    ]);
    expect(a).toBe("by-mirror-date-2024-05-01");
    expect(b).toBe(a);
  });

  test("distinct parameters give distinct fingerprints", () => {
    expect(fingerprint([{ name: "date", value: "2024-05-01" }])).not.toBe(
      fingerprint([{ name: "date", value: "2024-05-02" }]),
    );
  });

  test("empty parameters use the default token", () => {
    expect(fingerprint([])).toBe("artefact");
    expect(fingerprint([], "none")).toBe("none");
  });

  test("values are slugged", () => {
    expect(fingerprint([{ name: "label", value: "Hello World!" }])).toBe(
      "label-hello-world",
    );
  });
});

describe("slug", () => {
  test("collapses separators", () => {
    expect(slug("  A  b__c  ")).toBe("a-b-c");
  });

  test("drops diacritics", () => {
    expect(slug("Ärger über")).toBe("arger-uber");
  });
});

describe("stageKindSlug", () => {
  test("hyphen at lower-to-upper transitions", () => {
    expect(stageKindSlug("GndDump")).toBe("gnd-dump");
    expect(stageKindSlug("GndDatabase")).toBe("gnd-database");
    expect(stageKindSlug("SqliteDB")).toBe("sqlite-db");
  });

  test("single word", () => {
    expect(stageKindSlug("Dump")).toBe("dump");
  });
});

describe("canonical paths", () => {
  const addr = {
    tag: "gndzero",
    kind: "GndDump",
    parameters: [{ name: "date", value: "2024-05-01" }],
    ext: "rdf.gz",
  };

  test("artifactKey", () => {
    expect(artifactKey(addr)).toBe("gndzero/gnd-dump/date-2024-05-01.rdf.gz");
  });

  test("canonicalPath", () => {
    expect(canonicalPath("/base", addr)).toBe(
      "/base/gndzero/gnd-dump/date-2024-05-01.rdf.gz",
    );
  });

  test("scratch paths are random and stay in tmpDir", () => {
    const a = scratchPath("/scratch");
    const b = scratchPath("/scratch");
    expect(a).toMatch(/^\/scratch\/tasktree-[A-Za-z]{16}$/);
    expect(a).not.toBe(b);
  });
});
