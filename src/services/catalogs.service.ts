import catalogs from "../data/catalogs.json";

export type CatalogName = Exclude<keyof typeof catalogs, "bankAttributesByCountry">;

const lookup = (
  table: Readonly<Record<string, string>>,
  code: string,
): string | undefined =>
  Object.prototype.hasOwnProperty.call(table, code) ? table[code] : undefined;

/**
 * Label of a vendor code list entry (order status, relationship, ...)
 */
export const catalogLabel = (
  catalog: CatalogName,
  code: string | number,
): string | undefined => lookup(catalogs[catalog], String(code).trim());

/**
 * Bank fields a payout country expects, with a description of each
 */
export const bankAttributesFor = (
  countryCode: string,
): Readonly<Record<string, string>> => {
  const table: Readonly<Record<string, Readonly<Record<string, string>>>> =
    catalogs.bankAttributesByCountry;
  const key = countryCode.trim().toUpperCase();
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : {};
};
