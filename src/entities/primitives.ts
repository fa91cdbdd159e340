import { Schema } from "effect";

export const IntSchema = Schema.Number.pipe(Schema.int());
export type Int = typeof IntSchema.Type;

export const NonNegativeIntSchema = IntSchema.pipe(Schema.nonNegative());
export type NonNegativeInt = typeof NonNegativeIntSchema.Type;

// single key byte, used as a child accessor
export const ByteSchema = IntSchema.pipe(Schema.between(0, 255));
export type Byte = typeof ByteSchema.Type;
