import { beforeAll, describe, expect, it } from "vitest";

import { tokenModel } from "../__tests__/package-fixtures.js";
import { totalize } from "../totalize/totalize.js";

import { createArtifactEmitter, type ArtifactEmitter } from "./emitter.js";
import { loadArtifactTemplates, type ArtifactTemplates } from "./templates.js";

const BANNER = "/* Generated by facet-refine from package Token at v1. Do not edit. */";

describe("createArtifactEmitter", () => {
  let templates: ArtifactTemplates;
  let emitter: ArtifactEmitter;

  beforeAll(async () => {
    templates = await loadArtifactTemplates();
    emitter = createArtifactEmitter(templates);
  });

  it("renders the refinement of the token package", () => {
    const { refinement } = emitter.emit(totalize(tokenModel()));

    expect(refinement.fileName).toBe("FT_PACKAGE_INST_Token.ref");
    expect(refinement.text).toBe(
      [
        BANNER,
        "REFINEMENT FT_PACKAGE_INST_Token",
        "REFINES FT_PACKAGE",
        "SEES FT_PACKAGE_GLUE_Token",
        "",
        "VARIABLES",
        "    current, exports, exportedFuncs, layout, slotType, ext_to_impl, facetOf, reads, writes, requires",
        "",
        "INITIALISATION",
        "    current := v1 ||",
        "    exports := {",
        "        v1 |-> {i_IERC20}",
        "    } ||",
        "    exportedFuncs := {",
        "        v1 |-> {f_transfer}",
        "    } ||",
        "    layout := {",
        "        v1 |-> {balances}",
        "    } ||",
        "    slotType := {",
        "        v1 |-> {balances |-> t_MAP_ADDR_UINT}",
        "    } ||",
        "    ext_to_impl := {",
        "        f_transfer |-> im_transfer",
        "    } ||",
        "    facetOf := {",
        "        im_transfer |-> F1",
        "    } ||",
        "    reads := {",
        "        im_transfer |-> balances",
        "    } ||",
        "    writes := {",
        "        im_transfer |-> balances",
        "    } ||",
        "    requires := {}",
        "END",
        "",
      ].join("\n"),
    );
  });

  it("renders the glue machine of the token package", () => {
    const { glue } = emitter.emit(totalize(tokenModel()));

    expect(glue.fileName).toBe("FT_PACKAGE_GLUE_Token.mch");
    expect(glue.text).toBe(
      [
        BANNER,
        "MACHINE FT_PACKAGE_GLUE_Token",
        "",
        "SETS",
        "    PKGS = {Token};",
        "    VERSIONS = {v1};",
        "    IFACE_KINDS = {ik_external, ik_internal};",
        "    IFACES = {i_IERC20};",
        "    FUNCS = {f_transfer};",
        "    SELECTORS = {sel_a9059cbb};",
        "    EVENTS = {e_Transfer};",
        "    SLOTS = {balances};",
        "    TYPES = {t_ADDR, t_BOOL, t_MAP_ADDR_UINT, t_UINT};",
        "    IMPLS = {im_transfer};",
        "    FACETS = {F1}",
        "",
        "CONSTANTS",
        "    thisPkg, vrank, iface_kind, iface_funcs, iface_events, selector, funSig, eventSig",
        "",
        "PROPERTIES",
        "    thisPkg : PKGS &",
        "    thisPkg = Token &",
        "    vrank : VERSIONS >-> NAT1 &",
        "    vrank = {v1 |-> 1} &",
        "    iface_kind : IFACES --> IFACE_KINDS &",
        "    iface_kind = {i_IERC20 |-> ik_external} &",
        "    iface_funcs : IFACES <-> FUNCS &",
        "    iface_funcs = {i_IERC20 |-> f_transfer} &",
        "    iface_events : IFACES <-> EVENTS &",
        "    iface_events = {i_IERC20 |-> e_Transfer} &",
        "    selector : FUNCS --> SELECTORS &",
        "    selector = {f_transfer |-> sel_a9059cbb} &",
        "    funSig : FUNCS --> (seq(TYPES) * seq(TYPES)) &",
        "    funSig = {f_transfer |-> ([t_ADDR, t_UINT] |-> [t_BOOL])} &",
        "    eventSig : EVENTS --> seq(TYPES) &",
        "    eventSig = {e_Transfer |-> [t_ADDR, t_ADDR, t_UINT]}",
        "END",
        "",
      ].join("\n"),
    );
  });

  it("is independent of declaration order", () => {
    const forward = tokenModel({
      interfaces: [{ id: "IERC20", functions: ["transfer", "approve"] }],
      functions: [
        { id: "transfer", selector: "0xa9059cbb" },
        { id: "approve", selector: "0x095ea7b3" },
      ],
      events: [],
      implementations: [
        { id: "im_approve", facet: "F1", writes: ["balances"] },
        { id: "im_transfer", facet: "F1", reads: ["balances"], writes: ["balances"] },
      ],
      bindings: { transfer: "im_transfer", approve: "im_approve" },
    });
    const reversed = tokenModel({
      interfaces: [{ id: "IERC20", functions: ["approve", "transfer"] }],
      functions: [
        { id: "approve", selector: "0x095ea7b3" },
        { id: "transfer", selector: "0xA9059CBB" },
      ],
      events: [],
      implementations: [
        { id: "im_transfer", facet: "F1", writes: ["balances"], reads: ["balances"] },
        { id: "im_approve", facet: "F1", writes: ["balances"] },
      ],
      bindings: { approve: "im_approve", transfer: "im_transfer" },
    });

    expect(emitter.emit(totalize(reversed))).toEqual(emitter.emit(totalize(forward)));
    expect(emitter.emit(totalize(forward))).toEqual(emitter.emit(totalize(forward)));
  });

  it("applies naming and type overrides", () => {
    const custom = createArtifactEmitter(templates, {
      naming: {
        abstractMachine: "TOKEN_SPEC",
        refinementPrefix: "TOKEN_IMPL_",
        gluePrefix: "TOKEN_CTX_",
        refinementExt: ".ref",
        glueExt: ".mch",
      },
      typeOverrides: { bool: "t_FLAG" },
    });

    const { refinement, glue } = custom.emit(totalize(tokenModel()));

    expect(refinement.fileName).toBe("TOKEN_IMPL_Token.ref");
    expect(refinement.text.split("\n").slice(1, 4)).toEqual([
      "REFINEMENT TOKEN_IMPL_Token",
      "REFINES TOKEN_SPEC",
      "SEES TOKEN_CTX_Token",
    ]);
    expect(glue.fileName).toBe("TOKEN_CTX_Token.mch");
    expect(glue.text).toContain("    TYPES = {t_ADDR, t_FLAG, t_MAP_ADDR_UINT, t_UINT};\n");
    expect(glue.text).toContain(
      "    funSig = {f_transfer |-> ([t_ADDR, t_UINT] |-> [t_FLAG])} &\n",
    );
  });
});
