import { Data } from "effect";

export class NumericDegenerateError extends Data.TaggedError("NumericDegenerate")<{
  readonly message: string;
}> {}
