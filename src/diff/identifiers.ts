import type { RegulationDto } from "../registry/models";

export const DEFAULT_IDENTIFIER_SUFFIX = "-0";

export function withIdentifierSuffix(regulation: RegulationDto, suffix: string): RegulationDto {
  return { ...regulation, identifier: `${regulation.identifier}${suffix}` };
}

/**
 * Regulations whose identifier the registry does not know yet, in build order.
 * Identifiers are compared as exact strings.
 */
export function diffAgainstKnown(
  regulations: RegulationDto[],
  knownIdentifiers: Iterable<string>
): RegulationDto[] {
  const known = new Set(knownIdentifiers);
  return regulations.filter((regulation) => !known.has(regulation.identifier));
}
