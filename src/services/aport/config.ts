/**
 * APORT Tree Configuration & Factory
 *
 * The match mode trees are built with, read from `APORT_MATCH_MODE`
 * ("exact" | "optimistic", default "optimistic"), and a factory that builds
 * trees under it.
 *
 * @module AportService/Config
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer } from "effect";
import type { LazyArg } from "effect/Function";
import * as Aport from "../../entities/aport";

export const MatchModeConfig = Config.literal(
  "exact",
  "optimistic"
)("APORT_MATCH_MODE").pipe(Config.withDefault("optimistic" as const));

/**
 * AportConfig: settings shared by every tree a factory builds
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class AportConfig extends Context.Tag("@services/aport/AportConfig")<
  AportConfig,
  {
    readonly mode: Aport.MatchMode;
  }
>() {
  static layer = (mode: Aport.MatchMode) =>
    Layer.succeed(AportConfig, AportConfig.of({ mode }));
}

export const AportConfigLive = Layer.effect(
  AportConfig,
  Effect.gen(function* () {
    const mode = yield* MatchModeConfig;
    return AportConfig.of({ mode });
  })
);

/**
 * AportFactory capability: builds empty trees under the configured mode
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class AportFactory extends Context.Tag("@services/aport/AportFactory")<
  AportFactory,
  {
    readonly make: <T>(
      makeDefault: LazyArg<T>
    ) => Effect.Effect<Aport.AportTree<T>>;
  }
>() {}

export const AportFactoryLive = Layer.effect(
  AportFactory,
  Effect.gen(function* () {
    const config = yield* AportConfig;

    return AportFactory.of({
      make: <T>(makeDefault: LazyArg<T>) =>
        Effect.sync(() =>
          Aport.makeTree<T>({ mode: config.mode, makeDefault })
        ).pipe(
          Effect.tap(() =>
            Effect.logDebug("Created aport tree").pipe(
              Effect.annotateLogs({ mode: config.mode })
            )
          )
        ),
    });
  })
);
