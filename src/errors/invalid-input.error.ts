import { Data } from "effect";

export class InvalidInputError extends Data.TaggedError("InvalidInput")<{
  readonly message: string;
  readonly field?: string;
}> {}
