/**
 * blogEntry.* methods
 */

import { BaseCommand } from "./ApiCommand.js";

/** Comments on a blog entry */
export class BlogEntryCommentsCommand extends BaseCommand<"commentList"> {
    readonly kind = "blogEntry.comments";

    /** @param blogEntryId id from the entry URL, e.g. /blog/entry/82347 */
    constructor(readonly blogEntryId: number) {
        super("blogEntry.comments", "commentList", { blogEntryId });
    }
}

/** A single blog entry, including its content */
export class BlogEntryViewCommand extends BaseCommand<"blogEntry"> {
    readonly kind = "blogEntry.view";

    constructor(readonly blogEntryId: number) {
        super("blogEntry.view", "blogEntry", { blogEntryId });
    }
}
