/**
 * Codeforces Client
 *
 * Facade over the dispatcher with one method per API method. Methods
 * resolve to the decoded payload and reject with an ApiClientError;
 * `execute` keeps the error as a value instead.
 */

import type { ApiCommand } from "../commands/ApiCommand.js";
import { BlogEntryCommentsCommand, BlogEntryViewCommand } from "../commands/blog_entry_commands.js";
import {
    ContestHacksCommand,
    ContestListCommand,
    ContestRatingChangesCommand,
    ContestStandingsCommand,
    ContestStatusCommand,
    type ContestStandingsOptions,
    type ContestStatusOptions
} from "../commands/contest_commands.js";
import {
    ProblemsetProblemsCommand,
    ProblemsetRecentStatusCommand,
    type ProblemsetProblemsOptions,
    type ProblemsetRecentStatusOptions
} from "../commands/problemset_commands.js";
import { RecentActionsCommand } from "../commands/recent_actions_command.js";
import {
    UserBlogEntriesCommand,
    UserFriendsCommand,
    UserInfoCommand,
    UserRatedListCommand,
    UserRatingCommand,
    UserStatusCommand,
    type UserStatusOptions
} from "../commands/user_commands.js";
import {
    DEFAULT_CLIENT_CONFIG,
    loadClientConfigFromEnv,
    validateClientConfig,
    type ClientConfig
} from "../config/client_config.js";
import {
    loadCredentialsFromEnv,
    validateCredentials,
    type ApiCredentials
} from "../credentials/ApiCredentials.js";
import {
    Dispatcher,
    type DispatchOptions,
    type DispatchOutcome,
    type RawDispatchOutcome
} from "../dispatch/Dispatcher.js";
import type { RequestEventSink } from "../events/ops_request_event.js";
import type {
    BlogEntry,
    Comment,
    Contest,
    ContestStandings,
    Hack,
    Problemset,
    RatingChange,
    RecentAction,
    ResultShapes,
    ResultTag,
    Submission,
    User
} from "../responses/result_types.js";
import type { Clock, NonceSource } from "../signing/collaborators.js";
import { FetchTransport } from "../transport/FetchTransport.js";
import type { Transport } from "../transport/Transport.js";

export interface CodeforcesClientOptions {
    readonly config?: Partial<ClientConfig>;
    /** Defaults to a FetchTransport using config.requestTimeoutMs */
    readonly transport?: Transport;
    readonly clock?: Clock;
    readonly nonceSource?: NonceSource;
    /** Replaces the stdout event sink when config.emitEvents is on */
    readonly onEvent?: RequestEventSink;
}

export class CodeforcesClient {
    readonly config: ClientConfig;
    readonly #credentials: ApiCredentials;
    readonly #dispatcher: Dispatcher;

    constructor(credentials: ApiCredentials, options: CodeforcesClientOptions = {}) {
        const credentialCheck = validateCredentials(credentials);
        if (!credentialCheck.valid) {
            throw new Error(`Invalid credentials: ${credentialCheck.errors.join("; ")}`);
        }

        this.config = { ...DEFAULT_CLIENT_CONFIG, ...options.config };
        const configCheck = validateClientConfig(this.config);
        if (!configCheck.valid) {
            throw new Error(`Invalid client config: ${configCheck.errors.join("; ")}`);
        }

        this.#credentials = credentials;

        const dispatchOptions: DispatchOptions = {
            baseUrl: this.config.baseUrl,
            listSeparator: this.config.listSeparator,
            clock: options.clock,
            nonceSource: options.nonceSource,
            onEvent: this.config.emitEvents ? options.onEvent : null
        };
        const transport = options.transport ?? new FetchTransport({ timeoutMs: this.config.requestTimeoutMs });
        this.#dispatcher = new Dispatcher(transport, dispatchOptions);
    }

    /**
     * Client built from CODEFORCES_* environment variables.
     */
    static fromEnv(
        env: NodeJS.ProcessEnv = process.env,
        options: Omit<CodeforcesClientOptions, "config"> = {}
    ): CodeforcesClient {
        const credentials = loadCredentialsFromEnv(env);
        if (!credentials) {
            throw new Error("CODEFORCES_API_KEY and CODEFORCES_API_SECRET must be set");
        }
        return new CodeforcesClient(credentials, { ...options, config: loadClientConfigFromEnv(env) });
    }

    // -------------------------------------------------------------------------
    // Generic
    // -------------------------------------------------------------------------

    execute<T extends ResultTag>(command: ApiCommand<T>): Promise<DispatchOutcome<T>> {
        return this.#dispatcher.execute(command, this.#credentials);
    }

    executeRaw(command: ApiCommand): Promise<RawDispatchOutcome> {
        return this.#dispatcher.executeRaw(command, this.#credentials);
    }

    /**
     * Run a command and return its payload, or throw its error.
     */
    async get<T extends ResultTag>(command: ApiCommand<T>): Promise<ResultShapes[T]> {
        const outcome = await this.execute(command);
        if (!outcome.ok) {
            throw outcome.error;
        }
        return outcome.result.value;
    }

    // -------------------------------------------------------------------------
    // blogEntry.*
    // -------------------------------------------------------------------------

    blogEntryComments(blogEntryId: number): Promise<Comment[]> {
        return this.get(new BlogEntryCommentsCommand(blogEntryId));
    }

    viewBlogEntry(blogEntryId: number): Promise<BlogEntry> {
        return this.get(new BlogEntryViewCommand(blogEntryId));
    }

    // -------------------------------------------------------------------------
    // contest.*
    // -------------------------------------------------------------------------

    contestHacks(contestId: number): Promise<Hack[]> {
        return this.get(new ContestHacksCommand(contestId));
    }

    contestList(gym?: boolean): Promise<Contest[]> {
        return this.get(new ContestListCommand(gym));
    }

    contestRatingChanges(contestId: number): Promise<RatingChange[]> {
        return this.get(new ContestRatingChangesCommand(contestId));
    }

    contestStandings(options: ContestStandingsOptions): Promise<ContestStandings> {
        return this.get(new ContestStandingsCommand(options));
    }

    contestStatus(options: ContestStatusOptions): Promise<Submission[]> {
        return this.get(new ContestStatusCommand(options));
    }

    // -------------------------------------------------------------------------
    // problemset.*
    // -------------------------------------------------------------------------

    problemsetProblems(options: ProblemsetProblemsOptions = {}): Promise<Problemset> {
        return this.get(new ProblemsetProblemsCommand(options));
    }

    problemsetRecentStatus(options: ProblemsetRecentStatusOptions): Promise<Submission[]> {
        return this.get(new ProblemsetRecentStatusCommand(options));
    }

    // -------------------------------------------------------------------------
    // recentActions
    // -------------------------------------------------------------------------

    recentActions(maxCount: number): Promise<RecentAction[]> {
        return this.get(new RecentActionsCommand(maxCount));
    }

    // -------------------------------------------------------------------------
    // user.*
    // -------------------------------------------------------------------------

    userBlogEntries(handle: string): Promise<BlogEntry[]> {
        return this.get(new UserBlogEntriesCommand(handle));
    }

    userFriends(onlyOnline?: boolean): Promise<string[]> {
        return this.get(new UserFriendsCommand(onlyOnline));
    }

    userInfo(handles: readonly string[]): Promise<User[]> {
        return this.get(new UserInfoCommand(handles));
    }

    userRatedList(activeOnly?: boolean): Promise<User[]> {
        return this.get(new UserRatedListCommand(activeOnly));
    }

    userRating(handle: string): Promise<RatingChange[]> {
        return this.get(new UserRatingCommand(handle));
    }

    userStatus(options: UserStatusOptions): Promise<Submission[]> {
        return this.get(new UserStatusCommand(options));
    }
}
