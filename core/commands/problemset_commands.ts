/**
 * problemset.* methods
 */

import { BaseCommand } from "./ApiCommand.js";

export interface ProblemsetProblemsOptions {
    /** e.g. ["dp", "greedy"] */
    readonly tags?: readonly string[];
    /** Custom problemset short name, like "acmsguru" */
    readonly problemsetName?: string;
}

export class ProblemsetProblemsCommand extends BaseCommand<"problemset"> {
    readonly kind = "problemset.problems";

    constructor(readonly options: ProblemsetProblemsOptions = {}) {
        super("problemset.problems", "problemset", {
            tags: options.tags,
            problemsetName: options.problemsetName
        });
    }
}

export interface ProblemsetRecentStatusOptions {
    /** Up to 1000 */
    readonly count: number;
    readonly problemsetName?: string;
}

export class ProblemsetRecentStatusCommand extends BaseCommand<"submissionList"> {
    readonly kind = "problemset.recentStatus";

    constructor(readonly options: ProblemsetRecentStatusOptions) {
        super("problemset.recentStatus", "submissionList", {
            count: options.count,
            problemsetName: options.problemsetName
        });
    }
}
