/**
 * Result Types
 *
 * One result tag per payload shape the service can return. A command
 * declares the tag it expects; the decoder validates the payload against
 * that tag's schema and hands back `{ tag, value }`.
 */

import { z } from "zod";
import {
    blogEntrySchema,
    commentSchema,
    contestSchema,
    contestStandingsSchema,
    envelopeSchema,
    hackSchema,
    memberSchema,
    partySchema,
    problemResultSchema,
    problemSchema,
    problemStatisticsSchema,
    problemsetSchema,
    ranklistRowSchema,
    ratingChangeSchema,
    recentActionSchema,
    submissionSchema,
    userSchema,
    judgeProtocolSchema
} from "./result_schemas.js";

// ============================================================================
// Entities
// ============================================================================

export type Envelope = z.infer<typeof envelopeSchema>;
export type ResponseStatus = Envelope["status"];

export type User = z.infer<typeof userSchema>;
export type BlogEntry = z.infer<typeof blogEntrySchema>;
export type Comment = z.infer<typeof commentSchema>;
export type RecentAction = z.infer<typeof recentActionSchema>;
export type RatingChange = z.infer<typeof ratingChangeSchema>;
export type Contest = z.infer<typeof contestSchema>;
export type ContestType = Contest["type"];
export type ContestPhase = Contest["phase"];
export type Member = z.infer<typeof memberSchema>;
export type Party = z.infer<typeof partySchema>;
export type ParticipantType = Party["participantType"];
export type Problem = z.infer<typeof problemSchema>;
export type ProblemStatistics = z.infer<typeof problemStatisticsSchema>;
export type Problemset = z.infer<typeof problemsetSchema>;
export type Submission = z.infer<typeof submissionSchema>;
export type SubmissionVerdict = NonNullable<Submission["verdict"]>;
export type Testset = Submission["testset"];
export type JudgeProtocol = z.infer<typeof judgeProtocolSchema>;
export type Hack = z.infer<typeof hackSchema>;
export type HackVerdict = NonNullable<Hack["verdict"]>;
export type ProblemResult = z.infer<typeof problemResultSchema>;
export type RanklistRow = z.infer<typeof ranklistRowSchema>;
export type ContestStandings = z.infer<typeof contestStandingsSchema>;

// ============================================================================
// Result Union
// ============================================================================

export interface ResultShapes {
    commentList: Comment[];
    blogEntry: BlogEntry;
    blogEntryList: BlogEntry[];
    hackList: Hack[];
    contestList: Contest[];
    ratingChangeList: RatingChange[];
    contestStandings: ContestStandings;
    submissionList: Submission[];
    problemset: Problemset;
    recentActionList: RecentAction[];
    /** user.friends returns bare handles */
    friendList: string[];
    userList: User[];
}

export type ResultTag = keyof ResultShapes;

export interface TaggedResult<T extends ResultTag> {
    readonly tag: T;
    readonly value: ResultShapes[T];
}

/** Closed union over every result shape; switch on `tag` to narrow */
export type ApiResult = { [K in ResultTag]: TaggedResult<K> }[ResultTag];

export const RESULT_SCHEMAS: { readonly [K in ResultTag]: z.ZodType<ResultShapes[K]> } = {
    commentList: z.array(commentSchema),
    blogEntry: blogEntrySchema,
    blogEntryList: z.array(blogEntrySchema),
    hackList: z.array(hackSchema),
    contestList: z.array(contestSchema),
    ratingChangeList: z.array(ratingChangeSchema),
    contestStandings: contestStandingsSchema,
    submissionList: z.array(submissionSchema),
    problemset: problemsetSchema,
    recentActionList: z.array(recentActionSchema),
    friendList: z.array(z.string()),
    userList: z.array(userSchema)
};

export const RESULT_TAGS: readonly ResultTag[] = [
    "commentList",
    "blogEntry",
    "blogEntryList",
    "hackList",
    "contestList",
    "ratingChangeList",
    "contestStandings",
    "submissionList",
    "problemset",
    "recentActionList",
    "friendList",
    "userList"
];
