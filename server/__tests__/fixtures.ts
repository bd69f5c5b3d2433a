import { buildInventory, type InventoryRecord } from "../collection/inventory";
import { createUniversity, IdentityResolver, type ReferenceTable } from "../collection/identity";
import { computeGaps, type GapSet } from "../collection/gap-analyzer";

export function testReferenceTable(): ReferenceTable {
  return {
    universities: [
      createUniversity({ name: "Anglia Ruskin University", country: "England", domain: "aru.ac.uk" }),
      createUniversity({ name: "University of Cambridge", country: "England", domain: "cam.ac.uk" }),
      createUniversity({ name: "University of Oxford", country: "England", domain: "ox.ac.uk" }),
      createUniversity({ name: "King’s College London", country: "England", domain: "kcl.ac.uk" }),
      createUniversity({ name: "University of Bath", country: "England", domain: "bath.ac.uk" }),
      createUniversity({ name: "Plymouth College of Art", country: "England" }),
      createUniversity({ name: "University of Wales Trinity Saint David", country: "Wales", domain: "uwtsd.ac.uk" }),
      createUniversity({ name: "University of Edinburgh", country: "Scotland", domain: "ed.ac.uk" }),
    ],
    aliases: {
      "Univ. of Cambridge": "University of Cambridge",
      KCL: "King’s College London",
      ARU: "Anglia Ruskin University",
    },
  };
}

export function testResolver(): IdentityResolver {
  return new IdentityResolver(testReferenceTable());
}

export function record(
  university: string,
  year: number | null,
  overrides: Partial<InventoryRecord> = {},
): InventoryRecord {
  return {
    university,
    year,
    yearLabel: null,
    documentPath: `docs/${university.replace(/\W+/g, "_")}_${year ?? "unknown"}.pdf`,
    ...overrides,
  };
}

/** Gap set for `{ canonical name: known years }` with the window [2019, 2024]. */
export function gapSetFor(
  coverage: Record<string, number[]>,
  options: { resolver?: IdentityResolver; withUniverse?: boolean } = {},
): GapSet {
  const resolver = options.resolver ?? testResolver();
  const records = Object.entries(coverage).flatMap(([name, years]) => years.map((year) => record(name, year)));
  const { inventory } = buildInventory({ records }, resolver);
  return computeGaps(
    inventory,
    { lookbackYears: 3, lookaheadYears: 2 },
    2022,
    options.withUniverse ? { universe: resolver.universities } : {},
  );
}
