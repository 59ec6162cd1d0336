import { GENERIC_NAME_TOKENS } from "../../constants/facility.constants";

function stripGenericTokens(value: string): string {
  let stripped = value;
  // Removing one token can splice another together ("aviafbotion"), so repeat until none remain
  while (GENERIC_NAME_TOKENS.some((token) => stripped.includes(token))) {
    for (const token of GENERIC_NAME_TOKENS) {
      stripped = stripped.split(token).join("");
    }
  }
  return stripped;
}

/**
 * Canonical comparison key for a facility name.
 *
 * "Signature Aviation", "signature fbo" and " Signature " all map to "signature".
 * Applying it twice yields the same key.
 */
export function normalizeFacilityName(name: string): string {
  let key = stripGenericTokens(name.toLowerCase()).trim();

  while (key.includes("  ")) {
    key = key.replace(/ {2}/g, " ");
  }

  return key;
}
