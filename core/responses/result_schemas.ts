/**
 * Codeforces API Payload Schemas
 *
 * Shapes of the objects returned in the `result` field of a response.
 * Based on https://codeforces.com/apiHelp/objects. Fields the service may
 * leave out are optional; everything else is required and its absence is
 * a decode error. Unknown fields are dropped.
 */

import { z } from "zod";

const int = z.number().int();

// ============================================================================
// Envelope
// ============================================================================

export const responseStatusSchema = z.enum(["OK", "FAILED"]);

export const envelopeSchema = z.object({
    status: responseStatusSchema,
    result: z.unknown().optional(),
    comment: z.string().optional()
});

// ============================================================================
// Users, Blogs, Comments
// ============================================================================

export const userSchema = z.object({
    handle: z.string(),
    email: z.string().optional(),
    vkId: z.string().optional(),
    openId: z.string().optional(),
    firstName: z.string().optional(),
    lastName: z.string().optional(),
    country: z.string().optional(),
    city: z.string().optional(),
    organization: z.string().optional(),
    contribution: int,
    rank: z.string().optional(),
    rating: int.optional(),
    maxRank: z.string().optional(),
    maxRating: int.optional(),
    lastOnlineTimeSeconds: int,
    registrationTimeSeconds: int,
    friendOfCount: int,
    avatar: z.string(),
    titlePhoto: z.string()
});

export const blogEntrySchema = z.object({
    id: int,
    originalLocale: z.string(),
    creationTimeSeconds: int,
    authorHandle: z.string(),
    title: z.string(),
    /** Only present for blogEntry.view */
    content: z.string().optional(),
    locale: z.string(),
    modificationTimeSeconds: int,
    allowViewHistory: z.boolean(),
    tags: z.array(z.string()),
    rating: int
});

export const commentSchema = z.object({
    id: int,
    creationTimeSeconds: int,
    commentatorHandle: z.string(),
    locale: z.string(),
    text: z.string(),
    parentCommentId: int.optional(),
    rating: int
});

export const recentActionSchema = z.object({
    timeSeconds: int,
    blogEntry: blogEntrySchema.optional(),
    comment: commentSchema.optional()
});

export const ratingChangeSchema = z.object({
    contestId: int,
    contestName: z.string(),
    handle: z.string(),
    rank: int,
    ratingUpdateTimeSeconds: int,
    oldRating: int,
    newRating: int
});

// ============================================================================
// Contests
// ============================================================================

export const contestTypeSchema = z.enum(["CF", "IOI", "ICPC"]);

export const contestPhaseSchema = z.enum([
    "BEFORE",
    "CODING",
    "PENDING_SYSTEM_TEST",
    "SYSTEM_TEST",
    "FINISHED"
]);

export const contestSchema = z.object({
    id: int,
    name: z.string(),
    type: contestTypeSchema,
    phase: contestPhaseSchema,
    frozen: z.boolean().optional(),
    durationSeconds: int,
    startTimeSeconds: int.optional(),
    relativeTimeSeconds: int.optional(),
    preparedBy: z.string().optional(),
    websiteUrl: z.string().optional(),
    description: z.string().optional(),
    difficulty: int.optional(),
    kind: z.string().optional(),
    icpcRegion: z.string().optional(),
    country: z.string().optional(),
    city: z.string().optional(),
    season: z.string().optional()
});

export const participantTypeSchema = z.enum([
    "CONTESTANT",
    "PRACTICE",
    "VIRTUAL",
    "MANAGER",
    "OUT_OF_COMPETITION"
]);

export const memberSchema = z.object({
    handle: z.string(),
    name: z.string().optional()
});

export const partySchema = z.object({
    contestId: int.optional(),
    members: z.array(memberSchema),
    participantType: participantTypeSchema,
    teamId: int.optional(),
    teamName: z.string().optional(),
    ghost: z.boolean(),
    room: int.optional(),
    startTimeSeconds: int.optional()
});

// ============================================================================
// Problems
// ============================================================================

export const problemTypeSchema = z.enum(["PROGRAMMING", "QUESTION"]);

export const problemSchema = z.object({
    contestId: int.optional(),
    problemsetName: z.string().optional(),
    index: z.string().optional(),
    name: z.string(),
    type: problemTypeSchema,
    points: z.number().optional(),
    rating: int.optional(),
    tags: z.array(z.string())
});

export const problemStatisticsSchema = z.object({
    contestId: int.optional(),
    index: z.string().optional(),
    solvedCount: int
});

export const problemsetSchema = z.object({
    problems: z.array(problemSchema),
    problemStatistics: z.array(problemStatisticsSchema)
});

// ============================================================================
// Submissions & Hacks
// ============================================================================

export const submissionVerdictSchema = z.enum([
    "FAILED",
    "OK",
    "PARTIAL",
    "COMPILATION_ERROR",
    "RUNTIME_ERROR",
    "WRONG_ANSWER",
    "PRESENTATION_ERROR",
    "TIME_LIMIT_EXCEEDED",
    "MEMORY_LIMIT_EXCEEDED",
    "IDLENESS_LIMIT_EXCEEDED",
    "SECURITY_VIOLATED",
    "CRASHED",
    "INPUT_PREPARATION_CRASHED",
    "CHALLENGED",
    "SKIPPED",
    "TESTING",
    "REJECTED"
]);

export const testsetSchema = z.enum([
    "SAMPLES",
    "PRETESTS",
    "TESTS",
    "CHALLENGES",
    "TESTS1",
    "TESTS2",
    "TESTS3",
    "TESTS4",
    "TESTS5",
    "TESTS6",
    "TESTS7",
    "TESTS8",
    "TESTS9",
    "TESTS10"
]);

export const submissionSchema = z.object({
    id: int,
    contestId: int.optional(),
    creationTimeSeconds: int,
    relativeTimeSeconds: int.optional(),
    problem: problemSchema,
    author: partySchema,
    programmingLanguage: z.string(),
    verdict: submissionVerdictSchema.optional(),
    testset: testsetSchema,
    passedTestCount: int,
    timeConsumedMillis: int,
    memoryConsumedBytes: int,
    points: z.number().optional()
});

export const hackVerdictSchema = z.enum([
    "HACK_SUCCESSFUL",
    "HACK_UNSUCCESSFUL",
    "INVALID_INPUT",
    "GENERATOR_INCOMPILABLE",
    "GENERATOR_CRASHED",
    "IGNORED",
    "TESTING",
    "OTHER"
]);

export const judgeProtocolSchema = z.object({
    manual: z.string(),
    protocol: z.string(),
    verdict: z.string()
});

export const hackSchema = z.object({
    id: int,
    creationTimeSeconds: int,
    hacker: partySchema,
    defender: partySchema,
    verdict: hackVerdictSchema.optional(),
    problem: problemSchema,
    test: z.string().optional(),
    judgeProtocol: judgeProtocolSchema.optional()
});

// ============================================================================
// Standings
// ============================================================================

export const problemResultTypeSchema = z.enum(["PRELIMINARY", "FINAL"]);

export const problemResultSchema = z.object({
    points: z.number(),
    penalty: int.optional(),
    rejectedAttemptCount: int,
    type: problemResultTypeSchema,
    bestSubmissionTimeSeconds: int.optional()
});

export const ranklistRowSchema = z.object({
    party: partySchema,
    rank: int,
    points: z.number(),
    penalty: int,
    successfulHackCount: int,
    unsuccessfulHackCount: int,
    problemResults: z.array(problemResultSchema),
    lastSubmissionTimeSeconds: int.optional()
});

export const contestStandingsSchema = z.object({
    contest: contestSchema,
    problems: z.array(problemSchema),
    rows: z.array(ranklistRowSchema)
});
