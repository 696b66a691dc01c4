import { isSameArtist } from "../../utils/artistNormalization";
import { joinArtistCredits } from "./artistCredit";
import type { RawReleaseGroup } from "./lookupResponse";
import { Release, ReleaseTier, ReleaseTierScheme } from "./types";

export const SINGLE_SUFFIX = " - Single";

/** Lowest to highest trust. */
export const RELEASE_TIER_ORDER: readonly ReleaseTier[] = [
    ReleaseTier.NONE,
    ReleaseTier.MIX,
    ReleaseTier.COMPILATION,
    ReleaseTier.SINGLE,
    ReleaseTier.ALBUM,
];

export function compareReleaseTiers(a: ReleaseTier, b: ReleaseTier): number {
    return RELEASE_TIER_ORDER.indexOf(a) - RELEASE_TIER_ORDER.indexOf(b);
}

export function withSingleSuffix(title: string): string {
    return title.endsWith(SINGLE_SUFFIX) ? title : `${title}${SINGLE_SUFFIX}`;
}

function classifyExtended(
    primaryType: string,
    hasSecondaryTypes: boolean,
    sameArtist: boolean
): ReleaseTier {
    if (primaryType !== "album" && primaryType !== "single") {
        return ReleaseTier.NONE;
    }
    if (!sameArtist) {
        return ReleaseTier.MIX;
    }
    if (hasSecondaryTypes) {
        return ReleaseTier.COMPILATION;
    }
    return primaryType === "album" ? ReleaseTier.ALBUM : ReleaseTier.SINGLE;
}

function classifySimple(
    primaryType: string,
    hasSecondaryTypes: boolean,
    sameArtist: boolean
): ReleaseTier {
    if (primaryType === "album" && sameArtist && !hasSecondaryTypes) {
        return ReleaseTier.ALBUM;
    }
    if (primaryType === "single") {
        return ReleaseTier.SINGLE;
    }
    return ReleaseTier.NONE;
}

/**
 * Classifies one release-group of a recording. Returns null when the group
 * has no primary type or lands in no tier; such groups contribute nothing.
 *
 * A release-group without its own artist credit carries the recording's
 * credit (the lookup service omits it when identical).
 */
export function classifyReleaseGroup(
    group: RawReleaseGroup,
    recordingArtist: string,
    scheme: ReleaseTierScheme
): Release | null {
    if (!group.type) {
        return null;
    }

    const primaryType = group.type.trim().toLowerCase();
    const hasSecondaryTypes = (group.secondarytypes ?? []).length > 0;
    const groupArtist = group.artists
        ? joinArtistCredits(group.artists)
        : recordingArtist;
    const sameArtist = isSameArtist(groupArtist, recordingArtist);

    const tier =
        scheme === "simple"
            ? classifySimple(primaryType, hasSecondaryTypes, sameArtist)
            : classifyExtended(primaryType, hasSecondaryTypes, sameArtist);

    if (tier === ReleaseTier.NONE) {
        return null;
    }

    return {
        title: tier === ReleaseTier.SINGLE ? withSingleSuffix(group.title) : group.title,
        tier,
    };
}

/**
 * Synthetic release used when nothing classifies. Its NONE tier keeps it
 * from passing the confidence gate on its own.
 */
export function fallbackRelease(recordingTitle: string): Release {
    return {
        title: withSingleSuffix(recordingTitle),
        tier: ReleaseTier.NONE,
    };
}

/**
 * Picks the highest-tier release; the first one seen wins among equals.
 */
export function selectRelease(
    releases: readonly Release[],
    recordingTitle: string
): Release {
    let best: Release | null = null;
    for (const release of releases) {
        if (release.tier === ReleaseTier.NONE) {
            continue;
        }
        if (!best || compareReleaseTiers(release.tier, best.tier) > 0) {
            best = release;
        }
    }
    return best ?? fallbackRelease(recordingTitle);
}
