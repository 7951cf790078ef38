import { BaseCommand } from "./ApiCommand.js";

/** Recent blog and comment activity; maxCount up to 100 */
export class RecentActionsCommand extends BaseCommand<"recentActionList"> {
    readonly kind = "recentActions";

    constructor(readonly maxCount: number) {
        super("recentActions", "recentActionList", { maxCount });
    }
}
