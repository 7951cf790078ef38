/**
 * contest.* methods
 *
 * Hacks and rating changes are complete only some time after a contest
 * ends; during the contest a user sees only their own hacks.
 */

import { BaseCommand } from "./ApiCommand.js";

// ============================================================================
// Options
// ============================================================================

export interface ContestStandingsOptions {
    readonly contestId: number;
    /** 1-based index of the first standings row */
    readonly from?: number;
    readonly count?: number;
    /** At most 10000 handles */
    readonly handles?: readonly string[];
    /** Only participants from this room */
    readonly room?: number;
    /** Include virtual and out-of-competition participants */
    readonly showUnofficial?: boolean;
}

export interface ContestStatusOptions {
    readonly contestId: number;
    /** Only this user's submissions */
    readonly handle?: string;
    /** 1-based index of the first submission, most recent first */
    readonly from?: number;
    readonly count?: number;
}

// ============================================================================
// Commands
// ============================================================================

export class ContestHacksCommand extends BaseCommand<"hackList"> {
    readonly kind = "contest.hacks";

    constructor(readonly contestId: number) {
        super("contest.hacks", "hackList", { contestId });
    }
}

export class ContestListCommand extends BaseCommand<"contestList"> {
    readonly kind = "contest.list";

    /** @param gym true for gym contests, otherwise regular contests */
    constructor(readonly gym?: boolean) {
        super("contest.list", "contestList", { gym });
    }
}

export class ContestRatingChangesCommand extends BaseCommand<"ratingChangeList"> {
    readonly kind = "contest.ratingChanges";

    constructor(readonly contestId: number) {
        super("contest.ratingChanges", "ratingChangeList", { contestId });
    }
}

export class ContestStandingsCommand extends BaseCommand<"contestStandings"> {
    readonly kind = "contest.standings";

    constructor(readonly options: ContestStandingsOptions) {
        super("contest.standings", "contestStandings", {
            contestId: options.contestId,
            from: options.from,
            count: options.count,
            handles: options.handles,
            room: options.room,
            showUnofficial: options.showUnofficial
        });
    }
}

export class ContestStatusCommand extends BaseCommand<"submissionList"> {
    readonly kind = "contest.status";

    constructor(readonly options: ContestStatusOptions) {
        super("contest.status", "submissionList", {
            contestId: options.contestId,
            handle: options.handle,
            from: options.from,
            count: options.count
        });
    }
}
