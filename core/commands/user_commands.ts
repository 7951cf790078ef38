/**
 * user.* methods
 */

import { BaseCommand } from "./ApiCommand.js";

export class UserBlogEntriesCommand extends BaseCommand<"blogEntryList"> {
    readonly kind = "user.blogEntries";

    constructor(readonly handle: string) {
        super("user.blogEntries", "blogEntryList", { handle });
    }
}

/**
 * Friends of the user who owns the API key.
 */
export class UserFriendsCommand extends BaseCommand<"friendList"> {
    readonly kind = "user.friends";

    constructor(readonly onlyOnline?: boolean) {
        super("user.friends", "friendList", { onlyOnline });
    }
}

/**
 * The service fails the call when `handles` is empty.
 */
export class UserInfoCommand extends BaseCommand<"userList"> {
    readonly kind = "user.info";

    constructor(readonly handles: readonly string[]) {
        super("user.info", "userList", { handles });
    }
}

/** Users with at least one rated contest */
export class UserRatedListCommand extends BaseCommand<"userList"> {
    readonly kind = "user.ratedList";

    /** @param activeOnly only users rated during the last month */
    constructor(readonly activeOnly?: boolean) {
        super("user.ratedList", "userList", { activeOnly });
    }
}

export class UserRatingCommand extends BaseCommand<"ratingChangeList"> {
    readonly kind = "user.rating";

    constructor(readonly handle: string) {
        super("user.rating", "ratingChangeList", { handle });
    }
}

export interface UserStatusOptions {
    readonly handle: string;
    /** 1-based index of the first submission, most recent first */
    readonly from?: number;
    readonly count?: number;
}

export class UserStatusCommand extends BaseCommand<"submissionList"> {
    readonly kind = "user.status";

    constructor(readonly options: UserStatusOptions) {
        super("user.status", "submissionList", {
            handle: options.handle,
            from: options.from,
            count: options.count
        });
    }
}
