/**
 * Codeforces API Client - Public Exports
 *
 * Central export point for signing, commands, dispatch and decoding.
 */

// Errors
export {
    ApiClientError,
    ApiErrorCode,
    InvalidParameterError,
    TransportError,
    ApiError,
    DecodeError,
    createTransportError,
    isRetryableStatusCode
} from "./errors/ApiClientError.js";
export type { ApiErrorDetail, TransportFailureKind } from "./errors/ApiClientError.js";

// Credentials & config
export {
    loadCredentialsFromEnv,
    validateCredentials,
    maskApiKey,
    maskCredentials
} from "./credentials/ApiCredentials.js";
export type { ApiCredentials, CredentialValidationResult } from "./credentials/ApiCredentials.js";

export {
    DEFAULT_CLIENT_CONFIG,
    loadEnvFile,
    loadClientConfigFromEnv,
    validateClientConfig
} from "./config/client_config.js";
export type { ClientConfig, ConfigValidationResult } from "./config/client_config.js";

// Signing
export {
    DEFAULT_LIST_SEPARATOR,
    RESERVED_PARAMETERS,
    assertValidParameter,
    serializeValue,
    compareEncoded,
    encodeParameters,
    toQueryString,
    parseQueryString
} from "./signing/ParameterEncoder.js";
export type {
    ParameterValue,
    ParameterMap,
    EncodedParameter,
    EncodeOptions
} from "./signing/ParameterEncoder.js";

export { DEFAULT_API_BASE_URL, RequestSigner, computeSignature } from "./signing/RequestSigner.js";
export type { SignedRequest, RequestSignerOptions } from "./signing/RequestSigner.js";

export { NONCE_LENGTH, systemClock, randomNonce, fixedClock, fixedNonce } from "./signing/collaborators.js";
export type { Clock, NonceSource } from "./signing/collaborators.js";

// Commands
export { BaseCommand, CustomCommand, buildParameterMap } from "./commands/ApiCommand.js";
export type { ApiCommand, ParameterInput } from "./commands/ApiCommand.js";
export { BlogEntryCommentsCommand, BlogEntryViewCommand } from "./commands/blog_entry_commands.js";
export {
    ContestHacksCommand,
    ContestListCommand,
    ContestRatingChangesCommand,
    ContestStandingsCommand,
    ContestStatusCommand
} from "./commands/contest_commands.js";
export type { ContestStandingsOptions, ContestStatusOptions } from "./commands/contest_commands.js";
export { ProblemsetProblemsCommand, ProblemsetRecentStatusCommand } from "./commands/problemset_commands.js";
export type {
    ProblemsetProblemsOptions,
    ProblemsetRecentStatusOptions
} from "./commands/problemset_commands.js";
export { RecentActionsCommand } from "./commands/recent_actions_command.js";
export {
    UserBlogEntriesCommand,
    UserFriendsCommand,
    UserInfoCommand,
    UserRatedListCommand,
    UserRatingCommand,
    UserStatusCommand
} from "./commands/user_commands.js";
export type { UserStatusOptions } from "./commands/user_commands.js";
export type { CodeforcesCommand, CommandKind } from "./commands/index.js";

// Responses
export { RESULT_SCHEMAS, RESULT_TAGS } from "./responses/result_types.js";
export type {
    ApiResult,
    TaggedResult,
    ResultShapes,
    ResultTag,
    Envelope,
    ResponseStatus,
    User,
    BlogEntry,
    Comment,
    RecentAction,
    RatingChange,
    Contest,
    ContestType,
    ContestPhase,
    Member,
    Party,
    ParticipantType,
    Problem,
    ProblemStatistics,
    Problemset,
    Submission,
    SubmissionVerdict,
    Testset,
    JudgeProtocol,
    Hack,
    HackVerdict,
    ProblemResult,
    RanklistRow,
    ContestStandings
} from "./responses/result_types.js";
export {
    decodeEnvelope,
    decodeResult,
    decodeResponse,
    formatFieldPath,
    expectResult,
    ResultTagMismatchError
} from "./responses/ResponseDecoder.js";
export type { DecodeOptions } from "./responses/ResponseDecoder.js";

// Transport & dispatch
export type { Transport, TransportRequest, TransportResponse } from "./transport/Transport.js";
export { FetchTransport, DEFAULT_REQUEST_TIMEOUT_MS } from "./transport/FetchTransport.js";
export type { FetchTransportOptions } from "./transport/FetchTransport.js";

export { Dispatcher, execute, executeRaw, buildSignedRequest } from "./dispatch/Dispatcher.js";
export type {
    DispatchOutcome,
    RawDispatchOutcome,
    DispatchOptions,
    PreparedRequest
} from "./dispatch/Dispatcher.js";

// Observability
export { buildRequestEvent, emitRequestEvent } from "./ops/emit_request_event.js";
export type { OpsRequestEvent, RequestEventSink, RequestEventType } from "./events/ops_request_event.js";

// Client
export { CodeforcesClient } from "./client/CodeforcesClient.js";
export type { CodeforcesClientOptions } from "./client/CodeforcesClient.js";
