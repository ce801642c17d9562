import { describe, expect, it } from "vitest";

import { tokenModel, tokenSource } from "../__tests__/package-fixtures.js";

import {
  buildOntology,
  deltaSlotType,
  deriveExportedFunctions,
  relevantVersions,
  resolveExports,
} from "./model.js";
import { formatShapeIssue } from "./source.js";

function issuesOf(raw: unknown): string[] {
  const built = buildOntology(raw);
  if (built.ok) {
    throw new Error("Expected shape issues");
  }
  return built.issues.map(formatShapeIssue);
}

describe("buildOntology", () => {
  it("indexes a well-formed package", () => {
    const model = tokenModel();

    expect(model.packageId).toBe("Token");
    expect(model.current).toBe("v1");
    expect(model.functions.get("transfer")?.argTypes).toEqual(["address", "uint256"]);
    expect(model.declaringInterfaces.get("transfer")).toEqual(["IERC20"]);
    expect(model.facetOf.get("im_transfer")).toBe("F1");
    expect(model.versions.get("v1")?.slotTypes.get("balances")).toBe(
      "mapping(address=>uint256)",
    );
  });

  it("lowercases selectors and defaults interface kind to external", () => {
    const model = tokenModel({
      functions: [{ id: "transfer", selector: "0xA9059CBB" }],
    });

    expect(model.functions.get("transfer")?.selector).toBe("0xa9059cbb");
    expect(model.interfaces.get("IERC20")?.kind).toBe("external");
  });

  it("reports malformed selectors with their path", () => {
    const issues = issuesOf(tokenSource({ functions: [{ id: "transfer", selector: "0x1234" }] }));

    expect(issues).toEqual([
      "functions.0.selector: Expected a 4-byte selector written as 0x followed by 8 hex digits",
    ]);
  });

  it("reports malformed version tags", () => {
    const issues = issuesOf(tokenSource({ current: "1" }));

    expect(issues).toEqual(["current: Expected a version tag like v1, v2, ... up to v1024"]);
  });

  it("rejects version ranks above the supported bound", () => {
    const bound = "current: Expected a version tag like v1, v2, ... up to v1024";

    expect(buildOntology(tokenSource({ current: "v1024" })).ok).toBe(true);
    expect(issuesOf(tokenSource({ current: "v1025" }))).toEqual([bound]);
    expect(issuesOf(tokenSource({ current: "v99999999999999999999" }))).toEqual([bound]);
    expect(
      issuesOf(tokenSource({ versions: [{ id: "v4096", exports: ["IERC20"] }] })),
    ).toEqual(["versions.0.id: Expected a version tag like v1, v2, ... up to v1024"]);
  });

  it("reports duplicate ids at the repeated entry", () => {
    const issues = issuesOf(
      tokenSource({
        implementations: [
          { id: "im_transfer", facet: "F1" },
          { id: "im_transfer", facet: "F2" },
        ],
      }),
    );

    expect(issues).toEqual(['implementations.1: Duplicate implementation "im_transfer"']);
  });

  it("reports a slot declared twice in one version", () => {
    const issues = issuesOf(
      tokenSource({
        versions: [{ id: "v1", storage: [{ slot: "balances" }, { slot: "balances" }] }],
      }),
    );

    expect(issues).toEqual(['versions.0.storage.1: Duplicate slot "balances"']);
  });

  it("rejects unknown keys and missing versions", () => {
    expect(issuesOf({ ...tokenSource(), owner: "alice" })).toEqual([
      "<root>: Unrecognized keys: owner",
    ]);
    expect(issuesOf({ package: "Token", current: "v1" })).toEqual([
      "versions: Expected array, received undefined",
    ]);
  });
});

describe("version lookups", () => {
  const model = tokenModel({
    current: "v3",
    interfaces: [
      { id: "IERC20", functions: ["transfer"] },
      { id: "IPausable", functions: ["pause"] },
    ],
    functions: [
      { id: "transfer", selector: "0xa9059cbb" },
      { id: "pause", selector: "0x8456cb59" },
    ],
    versions: [
      { id: "v3", exports: ["IERC20", "IPausable"] },
      { id: "v1", exports: ["IERC20"] },
      { id: "v4", exports: [] },
    ],
  });

  it("orders declared versions up to current and drops staged ones", () => {
    expect(relevantVersions(model).map((delta) => delta.id)).toEqual(["v1", "v3"]);
  });

  it("carries exports through versions without a block", () => {
    expect(Array.from(resolveExports(model, "v2"))).toEqual(["IERC20"]);
    expect(Array.from(resolveExports(model, "v3"))).toEqual(["IERC20", "IPausable"]);
  });

  it("looks up slot types stated by one version block only", () => {
    const typed = tokenModel();

    expect(deltaSlotType(typed, "v1", "balances")).toBe("mapping(address=>uint256)");
    expect(deltaSlotType(typed, "v2", "balances")).toBeUndefined();
  });

  it("carries exports through a block that omits them", () => {
    const storageOnly = tokenModel({
      current: "v2",
      versions: [
        { id: "v1", exports: ["IERC20"], storage: [{ slot: "balances", type: "uint256" }] },
        { id: "v2", storage: [{ slot: "supply", type: "uint256" }] },
      ],
    });

    expect(storageOnly.versions.get("v2")?.exports).toBeNull();
    expect(Array.from(resolveExports(storageOnly, "v2"))).toEqual(["IERC20"]);
  });

  it("clears exports on an explicitly empty list", () => {
    const cleared = tokenModel({
      current: "v2",
      versions: [
        { id: "v1", exports: ["IERC20"], storage: [{ slot: "balances", type: "uint256" }] },
        { id: "v2", exports: [] },
      ],
    });

    expect(Array.from(resolveExports(cleared, "v2"))).toEqual([]);
  });

  it("derives exported functions from interfaces", () => {
    const exported = deriveExportedFunctions(model, resolveExports(model, "v3"));
    expect(Array.from(exported)).toEqual(["transfer", "pause"]);
  });
});
