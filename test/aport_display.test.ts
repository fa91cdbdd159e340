import { assert, describe, it } from "@effect/vitest";
import {
  ConfigProvider,
  Effect,
  Either,
  HashMap,
  Layer,
  LogLevel,
  Option,
} from "effect";
import * as Aport from "../src/entities/aport";
import { AportService, AportServiceLive } from "../src/services/aport";
import {
  AportConfig,
  AportConfigLive,
  AportFactory,
  AportFactoryLive,
} from "../src/services/aport/config";
import { AportDisplay, AportDisplayLive } from "../src/services/aport/display";
import { AportInsert, AportInsertLive } from "../src/services/aport/insert";
import { createMockLogger } from "./utils/mock_console";

const TestLayer = Layer.mergeAll(AportInsertLive, AportDisplayLive);

const configFrom = (entries: ReadonlyArray<[string, string]>) =>
  AportConfigLive.pipe(
    Layer.provide(
      Layer.setConfigProvider(ConfigProvider.fromMap(new Map(entries)))
    )
  );

describe("AportDisplay", () => {
  it.effect("should print one indented line per node", () =>
    Effect.gen(function* () {
      const insert = yield* AportInsert;
      const display = yield* AportDisplay;

      const tree = Aport.makeTree({ makeDefault: () => 0 });
      insert.insert(tree, "al", 0);
      insert.insert(tree, "arnold", 1);

      assert.strictEqual(
        display.displayTree(tree),
        "`a`\n `l`: 0\n `rnold`: 1"
      );
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("should print the root only when it holds a value", () =>
    Effect.gen(function* () {
      const insert = yield* AportInsert;
      const display = yield* AportDisplay;

      const tree = Aport.makeTree({ makeDefault: () => 0 });
      assert.strictEqual(display.displayTree(tree), "");

      insert.insert(tree, "x", 1);
      insert.insert(tree, "", 23);

      assert.strictEqual(display.displayTree(tree), "``: 23\n`x`: 1");
      assert.strictEqual(
        display.displayTree(tree, (value) => `#${value}`),
        "``: #23\n`x`: #1"
      );
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("should summarise shape", () =>
    Effect.gen(function* () {
      const insert = yield* AportInsert;
      const display = yield* AportDisplay;

      const tree = Aport.makeTree({ makeDefault: () => 0 });
      insert.insert(tree, "al", 0);
      insert.insert(tree, "arnold", 1);

      assert.strictEqual(
        display.displayCompact(tree),
        "Tree(mode=optimistic, length=2, nodes=4)"
      );
      assert.deepStrictEqual(display.collectStats(tree), {
        entries: 2,
        nodes: 4,
        maxDepth: 2,
      });
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("should log statistics", () => {
    const { mockLoggerLayer, messages } = createMockLogger();

    return Effect.gen(function* () {
      const insert = yield* AportInsert;
      const display = yield* AportDisplay;

      const tree = Aport.makeTree({ makeDefault: () => 0 });
      insert.insert(tree, "al", 0);
      insert.insert(tree, "arnold", 1);

      yield* display.logStats(tree);

      assert.deepStrictEqual(messages, [
        "Aport Tree Statistics",
        "Match mode:    optimistic",
        "Entries:       2",
        "Nodes:         4",
        "Max depth:     2",
      ]);
    }).pipe(Effect.provide(Layer.merge(TestLayer, mockLoggerLayer)));
  });
});

describe("AportConfig", () => {
  it.effect("should default to optimistic", () =>
    Effect.gen(function* () {
      const config = yield* AportConfig;
      assert.strictEqual(config.mode, "optimistic");
    }).pipe(Effect.provide(configFrom([])))
  );

  it.effect("should read the mode from APORT_MATCH_MODE", () =>
    Effect.gen(function* () {
      const config = yield* AportConfig;
      assert.strictEqual(config.mode, "exact");
    }).pipe(Effect.provide(configFrom([["APORT_MATCH_MODE", "exact"]])))
  );

  it.effect("should reject unknown modes", () =>
    Effect.gen(function* () {
      const result = yield* Effect.either(
        AportConfig.pipe(
          Effect.provide(configFrom([["APORT_MATCH_MODE", "fuzzy"]]))
        )
      );
      assert.isTrue(Either.isLeft(result));
    })
  );
});

describe("AportFactory", () => {
  it.effect("should build trees under the configured mode and log it", () => {
    const { mockLoggerLayer, logs, messages } = createMockLogger(
      LogLevel.Debug
    );

    return Effect.gen(function* () {
      const factory = yield* AportFactory;
      const tree = yield* factory.make(() => "");

      assert.strictEqual(tree.mode, "exact");
      assert.strictEqual(tree.length, 0);
      assert.strictEqual(tree.makeDefault(), "");

      assert.deepStrictEqual(messages, ["Created aport tree"]);
      assert.strictEqual(logs[0].level, LogLevel.Debug);
      assert.deepStrictEqual(
        HashMap.get(logs[0].annotations, "mode"),
        Option.some("exact")
      );
    }).pipe(
      Effect.provide(
        Layer.merge(
          AportFactoryLive.pipe(Layer.provide(AportConfig.layer("exact"))),
          mockLoggerLayer
        )
      )
    );
  });
});

describe("AportService", () => {
  it.effect("should expose every capability through one layer", () =>
    Effect.gen(function* () {
      const aport = yield* AportService;

      const tree = yield* aport.make(() => 0);
      aport.insert(tree, "arnold", 3);
      aport.insert(tree, "andrew", 4);
      aport.getOrCreate(tree, "al");

      assert.strictEqual(aport.length(tree), 3);
      assert.isTrue(aport.contains(tree, "al"));
      assert.isTrue(Option.isNone(aport.getOption(tree, "arbold")));
      assert.strictEqual(yield* aport.get(tree, "andrew"), 4);

      const cloned = aport.clone(tree);
      aport.eraseAt(cloned, aport.begin(cloned));
      assert.strictEqual(aport.length(cloned), 2);
      assert.isFalse(aport.contains(cloned, "al"));

      assert.strictEqual(
        aport.displayTree(tree),
        "`a`\n `l`: 0\n `ndrew`: 4\n `rnold`: 3"
      );
      assert.strictEqual(
        aport.displayCompact(cloned),
        "Tree(mode=exact, length=2, nodes=4)"
      );
    }).pipe(
      Effect.provide(
        AportServiceLive.pipe(Layer.provide(AportConfig.layer("exact")))
      )
    )
  );
});
