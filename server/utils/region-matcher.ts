import type { RegionRule } from '../config/config-schema.js';

export function matchesRegion(address: string, rule: RegionRule): boolean {
  if (!rule.all.every((part) => address.includes(part))) return false;
  if (rule.any.length > 0 && !rule.any.some((part) => address.includes(part))) return false;
  // a rule with no conditions never matches; defaults are configured separately
  return rule.all.length > 0 || rule.any.length > 0;
}

/** First rule (in configured order) that matches the address */
export function findRegionRule<R extends RegionRule>(address: string, rules: readonly R[]): R | undefined {
  return rules.find((rule) => matchesRegion(address, rule));
}
