import { describe, expect, it } from "vitest";

import { tokenModel } from "../__tests__/package-fixtures.js";
import { totalize } from "../totalize/totalize.js";

import { validateComposition } from "./composition.js";
import { RULES } from "./diagnostics.js";

function vaultModel(selector: string, slot: string) {
  return tokenModel({
    package: "Vault",
    interfaces: [{ id: "IVault", functions: ["deposit"] }],
    functions: [{ id: "deposit", selector, inputs: ["uint256"] }],
    events: [],
    versions: [{ id: "v1", exports: ["IVault"], storage: [{ slot, type: "uint256" }] }],
    implementations: [{ id: "im_deposit", facet: "F2", writes: [slot] }],
    bindings: { deposit: "im_deposit" },
  });
}

describe("validateComposition", () => {
  it("accepts disjoint packages", () => {
    const packages = [tokenModel(), vaultModel("0xb6b55f25", "deposits")].map(totalize);

    expect(validateComposition(packages)).toEqual([]);
  });

  it("reports selectors and slots shared across packages", () => {
    const packages = [vaultModel("0xA9059CBB", "balances"), tokenModel()].map(totalize);

    expect(validateComposition(packages)).toEqual([
      {
        rule: RULES.compositionSelectorDisjoint,
        entities: ["Token.transfer", "Vault.deposit"],
        message: "Selector 0xa9059cbb is exported by Token.transfer, Vault.deposit.",
      },
      {
        rule: RULES.compositionStorageDisjoint,
        entities: ["balances", "Token", "Vault"],
        message: "Slot balances is allocated by Token, Vault.",
      },
    ]);
  });

  it("leaves clashes inside one package to package validation", () => {
    expect(validateComposition([totalize(tokenModel())])).toEqual([]);
  });
});
