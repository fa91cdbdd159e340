import * as NodeRuntime from "@effect/platform-node/NodeRuntime";
import { Effect, Either, Layer, Logger } from "effect";
import * as Aport from "../src/entities/aport";
import { AportService, AportServiceLive } from "../src/services/aport";
import { AportConfig, AportConfigLive } from "../src/services/aport/config";

/**
 * Run a lookup and render its outcome on one line.
 */
const describeGet = (
  tree: Aport.AportTree<number>,
  key: string
): Effect.Effect<string, never, AportService> =>
  Effect.gen(function* () {
    const aport = yield* AportService;
    const result = yield* Effect.either(aport.get(tree, key));
    return Either.match(result, {
      onLeft: (error) => `  get("${key}")    → ${error.message}`,
      onRight: (value) => `  get("${key}")    → ${value}`,
    });
  });

const program = Effect.gen(function* () {
  const aport = yield* AportService;
  const config = yield* AportConfig;

  yield* Effect.logInfo(
    `${"=".repeat(70)}\nAPORT Optimistic Retrieval Demo\n${"=".repeat(70)}\n`
  );

  // Step 1: a single key, every same-length key with the same first byte hits it
  yield* Effect.log("");
  yield* Effect.log(`Step 1: Inserting "arnold" (mode=${config.mode})`);
  yield* Effect.log("-".repeat(70));

  const tree = yield* aport.make(() => 0);
  aport.insert(tree, "arnold", 3);

  yield* Effect.log(yield* describeGet(tree, "astrid"));
  yield* Effect.log(`  contains("astrid") → ${aport.contains(tree, "astrid")}`);

  // Step 2: a second key creates a disambiguation point at the second byte
  yield* Effect.log("");
  yield* Effect.log('Step 2: Inserting "andrew"');
  yield* Effect.log("-".repeat(70));

  aport.insert(tree, "andrew", 4);
  for (const key of ["arbold", "answer", "astrid"]) {
    yield* Effect.log(yield* describeGet(tree, key));
  }

  yield* Effect.log("");
  yield* Effect.log(aport.displayTree(tree));
  yield* Effect.log(aport.displayCompact(tree));

  // Step 3: get-or-create counting through the default factory
  yield* Effect.log("");
  yield* Effect.log("Step 3: Counting words with get-or-create");
  yield* Effect.log("-".repeat(70));

  const counts = yield* aport.make(() => 0);
  for (const word of "the cat sat on the mat by the cat".split(" ")) {
    aport.getOrCreate(counts, word).value += 1;
  }
  for (const entry of aport.entries(counts)) {
    yield* Effect.log(`  ${entry.text}: ${entry.value}`);
  }
  yield* aport.modify(counts, "cat", (n) => n * 100).pipe(
    Effect.flatMap((n) => Effect.log(`  cat, scaled: ${n}`)),
    Effect.orDie
  );

  yield* Effect.log("");
  yield* aport.logStats(counts);
  yield* Effect.log("=".repeat(70));
}).pipe(Effect.withLogSpan("aport-demo"));

const MainLive = AportServiceLive.pipe(
  Layer.provideMerge(AportConfigLive),
  Layer.merge(Logger.pretty)
);

program.pipe(Effect.provide(MainLive), NodeRuntime.runMain);
