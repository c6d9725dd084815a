import { z } from 'zod';

// Responses of the analysis service REST API

export const versionResponseSchema = z.object({
  version: z.string().min(1),
});

export type VersionResponse = z.infer<typeof versionResponseSchema>;

export const resourceResponseSchema = z.object({
  uuid: z.string().min(1),
  displayName: z.string(),
});

export type ResourceResponse = z.infer<typeof resourceResponseSchema>;

export const marketResponseSchema = resourceResponseSchema.extend({
  state: z.string(),
  runDate: z.string().nullish(),
  runCompleteDate: z.string().nullish(),
  unplacedEntities: z.boolean().nullish(),
});

export type MarketResponse = z.infer<typeof marketResponseSchema>;

const userSchema = z.object({
  username: z.string().min(1),
});

// Some releases wrap the current user in a single element list
export const currentUserResponseSchema = z.union([
  userSchema,
  z.array(userSchema).nonempty().transform((users) => users[0]),
]);

export const entityResponseSchema = z.object({
  uuid: z.string().min(1),
  displayName: z.string(),
  className: z.string(),
});

export const marketStatsResponseSchema = z.array(
  z.object({
    date: z.string().nullish(),
    statistics: z
      .array(
        z.object({
          name: z.string(),
          value: z.number().nullish(),
          units: z.string().nullish(),
        })
      )
      .default([]),
  })
);

// An empty body counts as success
export const deleteResponseSchema = z
  .boolean()
  .nullable()
  .transform((value) => value ?? true);

export const ignoredResponseSchema = z.unknown();
