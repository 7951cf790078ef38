import type { BlogEntryCommentsCommand, BlogEntryViewCommand } from "./blog_entry_commands.js";
import type {
    ContestHacksCommand,
    ContestListCommand,
    ContestRatingChangesCommand,
    ContestStandingsCommand,
    ContestStatusCommand
} from "./contest_commands.js";
import type { ProblemsetProblemsCommand, ProblemsetRecentStatusCommand } from "./problemset_commands.js";
import type { RecentActionsCommand } from "./recent_actions_command.js";
import type {
    UserBlogEntriesCommand,
    UserFriendsCommand,
    UserInfoCommand,
    UserRatedListCommand,
    UserRatingCommand,
    UserStatusCommand
} from "./user_commands.js";

/** Every method this library ships a command for; switch on `kind` */
export type CodeforcesCommand =
    | BlogEntryCommentsCommand
    | BlogEntryViewCommand
    | ContestHacksCommand
    | ContestListCommand
    | ContestRatingChangesCommand
    | ContestStandingsCommand
    | ContestStatusCommand
    | ProblemsetProblemsCommand
    | ProblemsetRecentStatusCommand
    | RecentActionsCommand
    | UserBlogEntriesCommand
    | UserFriendsCommand
    | UserInfoCommand
    | UserRatedListCommand
    | UserRatingCommand
    | UserStatusCommand;

export type CommandKind = CodeforcesCommand["kind"];
