// Species with point-mutation support in the AMR tool.
export const KNOWN_SPECIES = [
  "Campylobacter",
  "Escherichia",
  "Klebsiella_pneumoniae",
  "Salmonella",
  "Staphylococcus_aureus",
  "Vibrio_cholerae"
] as const;

export type KnownSpecies = (typeof KNOWN_SPECIES)[number];

export function isKnownSpecies(species: string): species is KnownSpecies {
  return KNOWN_SPECIES.some((known) => known === species);
}
