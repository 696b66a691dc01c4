import {
    classifyReleaseGroup,
    compareReleaseTiers,
    fallbackRelease,
    RELEASE_TIER_ORDER,
    selectRelease,
} from "../releaseClassifier";
import { ReleaseTier } from "../types";

describe("release tier ordering", () => {
    it("orders every pair of tiers consistently", () => {
        const expected = [
            ReleaseTier.NONE,
            ReleaseTier.MIX,
            ReleaseTier.COMPILATION,
            ReleaseTier.SINGLE,
            ReleaseTier.ALBUM,
        ];
        expect(RELEASE_TIER_ORDER).toEqual(expected);

        for (let i = 0; i < expected.length; i++) {
            for (let j = 0; j < expected.length; j++) {
                const comparison = compareReleaseTiers(expected[i], expected[j]);
                expect(Math.sign(comparison)).toBe(Math.sign(i - j));
                expect(expected[i] < expected[j]).toBe(i < j);
            }
        }
    });
});

describe("classifyReleaseGroup (extended scheme)", () => {
    const artist = "Artist";

    it("classifies a same-artist album without secondary types as ALBUM", () => {
        expect(
            classifyReleaseGroup(
                { type: "Album", title: "Album Name", artists: [{ name: "Artist" }] },
                artist,
                "extended"
            )
        ).toEqual({ title: "Album Name", tier: ReleaseTier.ALBUM });
    });

    it("treats a release-group without artists as carrying the recording credit", () => {
        expect(
            classifyReleaseGroup({ type: "Album", title: "Album Name" }, artist, "extended")
        ).toEqual({ title: "Album Name", tier: ReleaseTier.ALBUM });
    });

    it("suffixes single titles once", () => {
        expect(
            classifyReleaseGroup({ type: "Single", title: "Song" }, artist, "extended")
        ).toEqual({ title: "Song - Single", tier: ReleaseTier.SINGLE });
        expect(
            classifyReleaseGroup({ type: "single", title: "Song - Single" }, artist, "extended")
        ).toEqual({ title: "Song - Single", tier: ReleaseTier.SINGLE });
    });

    it("classifies same-artist albums with secondary types as COMPILATION", () => {
        expect(
            classifyReleaseGroup(
                { type: "Album", secondarytypes: ["Compilation"], title: "Best Of" },
                artist,
                "extended"
            )
        ).toEqual({ title: "Best Of", tier: ReleaseTier.COMPILATION });
    });

    it("classifies releases credited to someone else as MIX", () => {
        expect(
            classifyReleaseGroup(
                {
                    type: "Album",
                    title: "Club Hits",
                    artists: [{ name: "Various Artists" }],
                },
                artist,
                "extended"
            )
        ).toEqual({ title: "Club Hits", tier: ReleaseTier.MIX });
    });

    it("compares artists ignoring case, accents and ampersands", () => {
        expect(
            classifyReleaseGroup(
                { type: "Album", title: "Duo", artists: [{ name: "bjork and friends" }] },
                "Björk & Friends",
                "extended"
            )
        ).toEqual({ title: "Duo", tier: ReleaseTier.ALBUM });
    });

    it("skips groups without a type or with another primary type", () => {
        expect(classifyReleaseGroup({ title: "Untyped" }, artist, "extended")).toBeNull();
        expect(
            classifyReleaseGroup({ type: "EP", title: "Extended Play" }, artist, "extended")
        ).toBeNull();
    });
});

describe("classifyReleaseGroup (simple scheme)", () => {
    it("accepts singles regardless of artist and secondary types", () => {
        expect(
            classifyReleaseGroup(
                {
                    type: "Single",
                    secondarytypes: ["Remix"],
                    title: "Song",
                    artists: [{ name: "Someone Else" }],
                },
                "Artist",
                "simple"
            )
        ).toEqual({ title: "Song - Single", tier: ReleaseTier.SINGLE });
    });

    it("never produces MIX or COMPILATION", () => {
        expect(
            classifyReleaseGroup(
                { type: "Album", secondarytypes: ["Compilation"], title: "Best Of" },
                "Artist",
                "simple"
            )
        ).toBeNull();
        expect(
            classifyReleaseGroup(
                { type: "Album", title: "Club Hits", artists: [{ name: "DJ" }] },
                "Artist",
                "simple"
            )
        ).toBeNull();
    });
});

describe("selectRelease", () => {
    it("prefers the highest tier and the first release among equals", () => {
        const releases = [
            { title: "Song - Single", tier: ReleaseTier.SINGLE },
            { title: "First Album", tier: ReleaseTier.ALBUM },
            { title: "Second Album", tier: ReleaseTier.ALBUM },
        ];
        expect(selectRelease(releases, "Song")).toEqual({
            title: "First Album",
            tier: ReleaseTier.ALBUM,
        });
    });

    it("falls back to a NONE-tier single named after the recording", () => {
        expect(selectRelease([], "Song")).toEqual({
            title: "Song - Single",
            tier: ReleaseTier.NONE,
        });
        expect(fallbackRelease("Song")).toEqual(selectRelease([], "Song"));
    });
});
