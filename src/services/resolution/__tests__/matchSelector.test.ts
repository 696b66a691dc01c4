import {
    buildCandidates,
    buildMatch,
    rankingKey,
    selectBestMatch,
    SENTINEL_MATCH,
} from "../matchSelector";
import type { FilenameScorer } from "../filenameScorer";
import { LookupResult, Recording, ReleaseTier } from "../types";

function recording(
    artist: string,
    title: string,
    releases: Recording["releases"] = []
): Recording {
    return { artist, title, releases };
}

/** Scores candidates by a fixed table keyed on "Artist - Title". */
function tableScorer(table: Record<string, number>): FilenameScorer {
    return (_filename, candidate) => table[candidate] ?? 0;
}

describe("selectBestMatch", () => {
    it("returns the sentinel when there are no results", () => {
        expect(selectBestMatch([], "Artist - Song")).toBe(SENTINEL_MATCH);
        expect(SENTINEL_MATCH).toEqual({
            song: { artist: "", title: "", album: "" },
            score: { audio: 0, file: 0, release: ReleaseTier.NONE },
        });
    });

    it("returns the sentinel when results carry no recordings", () => {
        const results: LookupResult[] = [{ audioScore: 0.95, recordings: [] }];
        expect(selectBestMatch(results, "Artist - Song")).toBe(SENTINEL_MATCH);
    });

    it("lets the filename score dominate the release tier", () => {
        const results: LookupResult[] = [
            {
                audioScore: 0.9,
                recordings: [
                    recording("Artist", "Song"),
                    recording("Other", "Track", [
                        { title: "Big Album", tier: ReleaseTier.ALBUM },
                    ]),
                ],
            },
        ];
        const scorer = tableScorer({ "Artist - Song": 95, "Other - Track": 60 });

        expect(selectBestMatch(results, "whatever", scorer)).toEqual({
            song: { artist: "Artist", title: "Song", album: "Song - Single" },
            score: { audio: 0.9, file: 95, release: ReleaseTier.NONE },
        });
    });

    it("breaks equal filename scores by release tier", () => {
        const results: LookupResult[] = [
            {
                audioScore: 0.7,
                recordings: [
                    recording("Artist", "Song", [
                        { title: "Song - Single", tier: ReleaseTier.SINGLE },
                    ]),
                    recording("Artist", "Song", [
                        { title: "Album Name", tier: ReleaseTier.ALBUM },
                    ]),
                ],
            },
        ];

        const best = selectBestMatch(results, "Artist - Song", () => 100);
        expect(best.song.album).toBe("Album Name");
        expect(best.score.release).toBe(ReleaseTier.ALBUM);
    });

    it("keeps the earliest candidate on equal ranking keys, across runs", () => {
        const results: LookupResult[] = [
            { audioScore: 0.2, recordings: [recording("First", "Song")] },
            { audioScore: 0.99, recordings: [recording("Second", "Song")] },
        ];
        const scorer: FilenameScorer = () => 80;

        for (let run = 0; run < 3; run++) {
            const best = selectBestMatch(results, "Song", scorer);
            expect(best.song.artist).toBe("First");
            expect(best.score.audio).toBe(0.2);
        }
    });

    it("never ranks by audio score", () => {
        const results: LookupResult[] = [
            { audioScore: 0.1, recordings: [recording("Low", "Audio")] },
            { audioScore: 1, recordings: [recording("High", "Audio")] },
        ];
        const scorer = tableScorer({ "Low - Audio": 90, "High - Audio": 89 });

        expect(selectBestMatch(results, "x", scorer).song.artist).toBe("Low");
    });

    it("prefers the sentinel over a zero-score candidate", () => {
        const results: LookupResult[] = [
            { audioScore: 0.9, recordings: [recording("Artist", "Song")] },
        ];
        expect(selectBestMatch(results, "x", () => 0)).toBe(SENTINEL_MATCH);
    });
});

describe("buildCandidates", () => {
    it("puts the sentinel first and keeps response order", () => {
        const results: LookupResult[] = [
            { audioScore: 0.5, recordings: [recording("A", "One"), recording("B", "Two")] },
            { audioScore: 0.4, recordings: [recording("C", "Three")] },
        ];

        const candidates = buildCandidates(results, "x", () => 50);
        expect(candidates[0]).toBe(SENTINEL_MATCH);
        expect(candidates.map((c) => c.song.artist)).toEqual(["", "A", "B", "C"]);
    });
});

describe("buildMatch / rankingKey", () => {
    it("scores the candidate label and uses the selected release as album", () => {
        const scorer = jest.fn<number, [string, string]>(() => 77);
        const match = buildMatch(
            0.6,
            recording("Artist", "Song", [
                { title: "Best Of", tier: ReleaseTier.COMPILATION },
            ]),
            "Artist - Song (Live)",
            scorer
        );

        expect(scorer).toHaveBeenCalledWith("Artist - Song (Live)", "Artist - Song");
        expect(match).toEqual({
            song: { artist: "Artist", title: "Song", album: "Best Of" },
            score: { audio: 0.6, file: 77, release: ReleaseTier.COMPILATION },
        });
        expect(rankingKey(match)).toBe(77002);
    });
});
