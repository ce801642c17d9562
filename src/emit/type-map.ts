// Solidity type -> B type symbol mapping.

import type { TypeName } from "../ontology/model.js";

export type TypeOverrides = Readonly<Record<string, string>>;

export const B_TYPE_SYMBOLS = [
  "t_ADDR",
  "t_BOOL",
  "t_UINT",
  "t_MAP_ADDR_UINT",
  "t_MAP_ADDR_ADDR_UINT",
  "t_OPAQUE",
] as const;

const ADDRESS_MAP_PREFIX = "t_MAP_ADDR_";
const UINT_PATTERN = /^uint[0-9]*$/;

export function toBType(type: TypeName, overrides: TypeOverrides = {}): string {
  const override = overrides[type];
  if (override !== undefined) {
    return override;
  }

  if (type === "address") return "t_ADDR";
  if (type === "bool") return "t_BOOL";
  if (UINT_PATTERN.test(type)) return "t_UINT";
  if (type.startsWith("mapping(address=>mapping(address=>uint")) return "t_MAP_ADDR_ADDR_UINT";
  if (type.startsWith("mapping(address=>uint")) return "t_MAP_ADDR_UINT";
  return "t_OPAQUE";
}

/** B type symbols for `types`, plus t_ADDR and t_UINT whenever an address-keyed map appears. */
export function collectBTypes(types: Iterable<TypeName>, overrides: TypeOverrides = {}): string[] {
  const symbols = new Set<string>();
  for (const type of types) {
    const symbol = toBType(type, overrides);
    symbols.add(symbol);
    if (symbol.startsWith(ADDRESS_MAP_PREFIX)) {
      symbols.add("t_ADDR");
      symbols.add("t_UINT");
    }
  }
  return Array.from(symbols);
}
