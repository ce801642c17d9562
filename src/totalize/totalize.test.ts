import { describe, expect, it } from "vitest";

import { tokenModel } from "../__tests__/package-fixtures.js";

import { currentVersion, slotTypeAt, sortPairs, totalize, versionAt } from "./totalize.js";

describe("totalize", () => {
  it("produces one entry per version up to current", () => {
    const totalized = totalize(tokenModel());

    expect(totalized.versions).toHaveLength(1);
    expect(currentVersion(totalized)).toMatchObject({
      id: "v1",
      exports: ["IERC20"],
      exportedFunctions: ["transfer"],
      layout: ["balances"],
    });
    expect(totalized.bindings).toEqual([["transfer", "im_transfer"]]);
    expect(totalized.facetOf).toEqual([["im_transfer", "F1"]]);
    expect(totalized.reads).toEqual([["im_transfer", "balances"]]);
    expect(totalized.writes).toEqual([["im_transfer", "balances"]]);
  });

  it("grows layouts monotonically and fills version gaps", () => {
    const totalized = totalize(
      tokenModel({
        current: "v4",
        interfaces: [
          { id: "IERC20", functions: ["transfer"] },
          { id: "IPausable", functions: ["pause"] },
        ],
        functions: [
          { id: "transfer", selector: "0xa9059cbb" },
          { id: "pause", selector: "0x8456cb59" },
        ],
        events: [],
        versions: [
          {
            id: "v1",
            exports: ["IERC20"],
            storage: [{ slot: "balances", type: "mapping(address => uint256)" }],
          },
          {
            id: "v3",
            exports: ["IPausable", "IERC20"],
            storage: [{ slot: "paused", type: "bool" }],
          },
          {
            id: "v4",
            exports: ["IPausable", "IERC20"],
            storage: [
              { slot: "allowances", type: "mapping(address => mapping(address => uint256))" },
            ],
          },
          { id: "v5", exports: [], storage: [{ slot: "draft", type: "bool" }] },
        ],
      }),
    );

    expect(totalized.versions.map((version) => version.id)).toEqual(["v1", "v2", "v3", "v4"]);
    expect(totalized.versions.map((version) => version.layout)).toEqual([
      ["balances"],
      ["balances"],
      ["balances", "paused"],
      ["allowances", "balances", "paused"],
    ]);
    expect(versionAt(totalized, "v2").exports).toEqual(["IERC20"]);
    expect(slotTypeAt(totalized, "v2", "balances")).toBe("mapping(address=>uint256)");
    expect(slotTypeAt(totalized, "v2", "paused")).toBeUndefined();
    expect(slotTypeAt(totalized, "v4", "paused")).toBe("bool");
    expect(() => versionAt(totalized, "v5")).toThrow("Totalized model has no entry for v5");
    expect(totalized.versions[2]?.exports).toEqual(["IERC20", "IPausable"]);
    expect(totalized.versions[2]?.exportedFunctions).toEqual(["pause", "transfer"]);
    expect(Object.fromEntries(currentVersion(totalized).slotTypes)).toEqual({
      balances: "mapping(address=>uint256)",
      paused: "bool",
      allowances: "mapping(address=>mapping(address=>uint256))",
    });
  });

  it("keeps the first declared type of a re-declared slot", () => {
    const totalized = totalize(
      tokenModel({
        current: "v2",
        versions: [
          { id: "v1", exports: ["IERC20"], storage: [{ slot: "owner", type: "address" }] },
          { id: "v2", exports: ["IERC20"], storage: [{ slot: "owner" }] },
        ],
      }),
    );

    expect(totalized.versions[1]?.slotTypes.get("owner")).toBe("address");
  });

  it("carries exports forward from a block that only adds storage", () => {
    const totalized = totalize(
      tokenModel({
        current: "v2",
        versions: [
          { id: "v1", exports: ["IERC20"], storage: [{ slot: "owner", type: "address" }] },
          { id: "v2", storage: [{ slot: "paused", type: "bool" }] },
        ],
      }),
    );

    expect(currentVersion(totalized)).toMatchObject({
      id: "v2",
      exports: ["IERC20"],
      exportedFunctions: ["transfer"],
      layout: ["owner", "paused"],
    });
  });

  it("does not mutate earlier versions while folding", () => {
    const totalized = totalize(
      tokenModel({
        current: "v2",
        versions: [
          { id: "v1", exports: ["IERC20"], storage: [{ slot: "owner", type: "address" }] },
          { id: "v2", exports: ["IERC20"], storage: [{ slot: "paused", type: "bool" }] },
        ],
      }),
    );

    expect(Array.from(totalized.versions[0]?.slotTypes.keys() ?? [])).toEqual(["owner"]);
  });
});

describe("sortPairs", () => {
  it("sorts by code unit and drops duplicates", () => {
    expect(
      sortPairs([
        ["b", "x"],
        ["B", "y"],
        ["b", "x"],
        ["a", "z"],
      ]),
    ).toEqual([
      ["B", "y"],
      ["a", "z"],
      ["b", "x"],
    ]);
  });
});
