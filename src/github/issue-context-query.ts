import { z } from "zod";

export const ISSUE_CONTEXT_QUERY = `
query IssueContext($owner: String!, $name: String!, $number: Int!, $commentsPageSize: Int!) {
  repository(owner: $owner, name: $name) {
    issue(number: $number) {
      id
      number
      title
      body
      createdAt
      author {
        login
      }
      comments(last: $commentsPageSize) {
        totalCount
        nodes {
          id
          author {
            login
          }
          body
          bodyText
          createdAt
        }
      }
    }
  }
}
`.trim();

const actorSchema = z.object({ login: z.string().nullish() }).nullish();

const commentNodeSchema = z
  .object({
    id: z.string().nullish(),
    author: actorSchema,
    // `body` is the markdown source and keeps HTML comments such as the
    // signature marker; `bodyText` is the rendered fallback.
    body: z.string().nullish(),
    bodyText: z.string().nullish(),
    createdAt: z.string().nullish(),
  })
  .nullable();

const issueSchema = z.object({
  id: z.string().nullish(),
  number: z.number().int(),
  title: z.string().nullish(),
  body: z.string().nullish(),
  createdAt: z.string().nullish(),
  author: actorSchema,
  comments: z
    .object({
      totalCount: z.number().int().nullish(),
      nodes: z.array(commentNodeSchema).nullish(),
    })
    .nullish(),
});

const graphqlErrorSchema = z
  .object({
    message: z.string().nullish(),
    type: z.string().nullish(),
    extensions: z.object({ code: z.string().nullish() }).passthrough().nullish(),
  })
  .passthrough();

export const issueContextEnvelopeSchema = z.object({
  data: z
    .object({
      repository: z.object({ issue: issueSchema.nullish() }).nullish(),
    })
    .nullish(),
  errors: z.array(graphqlErrorSchema).nullish(),
});

export type IssueContextEnvelope = z.infer<typeof issueContextEnvelopeSchema>;
export type IssueNode = z.infer<typeof issueSchema>;
export type CommentNode = z.infer<typeof commentNodeSchema>;
export type GraphQLErrorEntry = z.infer<typeof graphqlErrorSchema>;

/** Scope errors arrive as `extensions.code` on newer responses and `type` on older ones. */
export function errorCode(error: GraphQLErrorEntry): string | undefined {
  return error.extensions?.code ?? error.type ?? undefined;
}
