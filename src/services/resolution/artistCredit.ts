import type { ArtistCredit } from "./lookupResponse";

/**
 * Joins artist-credit fragments into one display string, e.g.
 * `[{name: "A", joinphrase: " feat. "}, {name: "B"}]` → `"A feat. B"`.
 */
export function joinArtistCredits(credits: readonly ArtistCredit[]): string {
    let joined = "";
    for (const credit of credits) {
        joined += credit.name + (credit.joinphrase ?? "");
    }
    return joined;
}
