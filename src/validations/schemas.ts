import { z } from "zod";

const id = z.number().int().positive();

// an empty string counts as a missing value
const text = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema);

export const commentSchema = z.object({
  content: text(z.string().min(1)),
});

export const likeSchema = z.object({
  post_id: id,
  user_id: id,
});

export const postSchema = z.object({
  title: text(z.string().min(1)),
  user_id: id,
  comment: commentSchema.optional(),
  likes: z.array(likeSchema.omit({ post_id: true })).optional(),
});

export const userSchema = z.object({
  username: text(z.string().min(2)),
  age: z.number().int().positive().optional(),
  posts: z.array(postSchema.omit({ user_id: true })).optional(),
  likes: z.array(likeSchema.omit({ user_id: true })).optional(),
});

export type PostInput = z.infer<typeof postSchema>;
export type UserInput = z.infer<typeof userSchema>;

export const idParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});
