import * as readline from "readline/promises";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";
import type {
    CorrectionPrompter,
    CorrectionRequest,
    CorrectionResponse,
} from "./resolution/types";

export type AskFn = (question: string) => Promise<string>;
export type PrintFn = (line: string) => void;

const TRUTHY_ANSWERS = new Set(["y", "yes", "t", "true", "on", "1"]);
const FALSY_ANSWERS = new Set(["n", "no", "f", "false", "off", "0"]);

export function parseYesNo(answer: string): boolean | null {
    const normalized = answer.trim().toLowerCase();
    if (TRUTHY_ANSWERS.has(normalized)) return true;
    if (FALSY_ANSWERS.has(normalized)) return false;
    return null;
}

/**
 * Terminal review dialogue: shows the best guess, then collects optional
 * overrides for artist, title and album plus the submission choice.
 */
export class TerminalCorrectionPrompter implements CorrectionPrompter {
    constructor(
        private readonly ask: AskFn,
        private readonly print: PrintFn = (line) => console.log(line)
    ) {}

    async review({ filename, song }: CorrectionRequest): Promise<CorrectionResponse> {
        this.print("Auto tagging finished with a low confidence level");
        this.print(`Filename: ${filename}`);
        this.print(`Artist: ${song.artist}`);
        this.print(`Title: ${song.title}`);
        this.print(`Album: ${song.album}`);

        if (!(await this.askYesNo("Perform manual adjustments? "))) {
            return null;
        }

        this.print("Leave individual fields blank to keep the old value");
        const artist = await this.ask("New Artist: ");
        const title = await this.ask("New Title: ");
        const album = await this.ask("New Album: ");
        const submit = await this.askYesNo("Submit new tags to the AcoustID web service? ");

        return { artist, title, album, submit };
    }

    private async askYesNo(question: string): Promise<boolean> {
        for (;;) {
            const answer = parseYesNo(await this.ask(question));
            if (answer !== null) {
                return answer;
            }
            this.print("Please answer y(es) or n(o)!");
        }
    }
}

export interface TerminalPrompterOptions {
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
    print?: PrintFn;
}

function inputClosedError(): AppError {
    return new AppError(
        ErrorCode.INPUT_CLOSED,
        ErrorCategory.FATAL,
        "Input closed before the review was answered"
    );
}

/**
 * Prompter bound to stdin/stdout by default. Once the input closes, pending
 * and later questions reject with INPUT_CLOSED. Call `close` once the batch
 * is done so the process can exit.
 */
export function createTerminalPrompter(options: TerminalPrompterOptions = {}): {
    prompter: TerminalCorrectionPrompter;
    close: () => void;
} {
    const rl = readline.createInterface({
        input: options.input ?? process.stdin,
        output: options.output ?? process.stdout,
    });
    const closed = new AbortController();
    rl.once("close", () => closed.abort());

    const ask: AskFn = async (question) => {
        if (closed.signal.aborted) {
            throw inputClosedError();
        }
        try {
            return await rl.question(question, { signal: closed.signal });
        } catch (error) {
            if (closed.signal.aborted) {
                throw inputClosedError();
            }
            throw error;
        }
    };

    return {
        prompter: new TerminalCorrectionPrompter(ask, options.print),
        close: () => {
            if (!closed.signal.aborted) {
                rl.close();
            }
        },
    };
}
