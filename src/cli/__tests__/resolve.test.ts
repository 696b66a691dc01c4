import {
    formatSummary,
    makeResolveCommand,
    policyFromOptions,
    ResolveCommandOptions,
    ResolveRunner,
    routerOptionsFromCli,
} from "../resolve";
import { createSong } from "../../services/resolution/types";

function createCommand(exitCode = 0) {
    const run = jest.fn<ReturnType<ResolveRunner>, Parameters<ResolveRunner>>(
        async () => exitCode
    );
    const command = makeResolveCommand(run)
        .exitOverride()
        .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
    return { command, run };
}

function argv(...args: string[]): string[] {
    return ["node", "tuneresolve", ...args];
}

describe("tuneresolve command", () => {
    afterEach(() => {
        process.exitCode = undefined;
    });

    it("passes files and default options to the runner", async () => {
        const { command, run } = createCommand();

        await command.parseAsync(argv("a.mp3", "b.flac"));

        expect(run).toHaveBeenCalledWith(["a.mp3", "b.flac"], {
            outputDirectory: "finished",
            skipDirectory: "skipped",
            verbose: 0,
        });
        expect(process.exitCode).toBe(0);
    });

    it("parses every flag", async () => {
        const { command, run } = createCommand(1);

        await command.parseAsync(
            argv("-k", "-s", "-m", "-vv", "-o", "/music/done", "-d", "/music/held", "a.mp3")
        );

        expect(run).toHaveBeenCalledWith(["a.mp3"], {
            keep: true,
            skip: true,
            manual: true,
            verbose: 2,
            outputDirectory: "/music/done",
            skipDirectory: "/music/held",
        });
        expect(process.exitCode).toBe(1);
    });

    it("requires at least one file", async () => {
        const { command, run } = createCommand();

        await expect(command.parseAsync(argv())).rejects.toMatchObject({
            code: "commander.missingArgument",
        });
        expect(run).not.toHaveBeenCalled();
    });
});

describe("option mapping", () => {
    const options: ResolveCommandOptions = {
        outputDirectory: "out",
        skipDirectory: "held",
        skip: true,
        verbose: 0,
    };

    it("maps flags to a resolution policy", () => {
        expect(policyFromOptions(options)).toEqual({
            forceManual: false,
            skipUnconfident: true,
        });
        expect(policyFromOptions({ ...options, manual: true, skip: undefined })).toEqual({
            forceManual: true,
            skipUnconfident: false,
        });
    });

    it("maps flags to file placement", () => {
        expect(routerOptionsFromCli(options)).toEqual({
            outputDirectory: "out",
            skipDirectory: "held",
            keepOriginal: false,
        });
        expect(routerOptionsFromCli({ ...options, keep: true }).keepOriginal).toBe(true);
    });
});

describe("formatSummary", () => {
    it("lists each file and the totals", () => {
        const lines = formatSummary({
            outcomes: [
                {
                    file: "a.mp3",
                    status: "accepted",
                    song: createSong("Artist", "Song", "Album Name"),
                    destination: "finished/Artist - Song.mp3",
                },
                { file: "b.mp3", status: "skipped", destination: "skipped/b.mp3" },
                { file: "c.mp3", status: "failed", error: "File not found: c.mp3" },
            ],
            counts: { accepted: 1, corrected: 0, skipped: 1, failed: 1 },
        });

        expect(lines).toEqual([
            "a.mp3\n--> Artist - Song [Album Name]\n--> accepted: finished/Artist - Song.mp3",
            "b.mp3\n--> skipped: skipped/b.mp3",
            "c.mp3\n--> failed: File not found: c.mp3",
            "Done: 1 accepted, 0 corrected, 1 skipped, 1 failed",
        ]);
    });
});
