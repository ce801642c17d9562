import { describe, expect, it } from "vitest";

import { collectBTypes, toBType } from "./type-map.js";

describe("toBType", () => {
  it("maps the supported Solidity types", () => {
    expect(toBType("address")).toBe("t_ADDR");
    expect(toBType("bool")).toBe("t_BOOL");
    expect(toBType("uint")).toBe("t_UINT");
    expect(toBType("uint8")).toBe("t_UINT");
    expect(toBType("mapping(address=>uint256)")).toBe("t_MAP_ADDR_UINT");
    expect(toBType("mapping(address=>mapping(address=>uint256))")).toBe("t_MAP_ADDR_ADDR_UINT");
  });

  it("falls back to an opaque symbol", () => {
    expect(toBType("bytes32")).toBe("t_OPAQUE");
    expect(toBType("int256")).toBe("t_OPAQUE");
  });

  it("prefers configured overrides", () => {
    expect(toBType("bytes32", { bytes32: "t_HASH" })).toBe("t_HASH");
  });
});

describe("collectBTypes", () => {
  it("adds the atoms of address-keyed maps", () => {
    expect(collectBTypes(["mapping(address=>mapping(address=>uint256))", "bool"])).toEqual([
      "t_MAP_ADDR_ADDR_UINT",
      "t_ADDR",
      "t_UINT",
      "t_BOOL",
    ]);
  });
});
