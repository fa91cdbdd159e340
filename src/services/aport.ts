/**
 * APORT Tree Service
 *
 * Unified service providing all APORT capabilities:
 * - Factory: Build trees under the configured match mode
 * - Insert: Upserts and get-or-create
 * - Erase: Removal by key and by cursor
 * - Query: Membership and retrieval
 * - Iteration: Cursor protocol over the order-tracking index
 * - Copy: Deep copy, move and clear
 * - Display: Dumps and statistics
 *
 * @module AportService
 * @since 0.1.0
 */

import { Context, Effect, Layer, Option } from "effect";
import type { LazyArg } from "effect/Function";
import * as Aport from "../entities/aport";
import { AportFactory, AportFactoryLive } from "./aport/config";
import { AportCopy, AportCopyLive, type CloneOptions } from "./aport/copy";
import { AportDisplay, AportDisplayLive, type TreeStats } from "./aport/display";
import { AportErase, AportEraseLive } from "./aport/erase";
import { AportInsert, AportInsertLive } from "./aport/insert";
import { AportIteration, AportIterationLive } from "./aport/iterate";
import { AportQuery, AportQueryLive } from "./aport/query";

/**
 * Unified APORT Service
 *
 * Provides all capabilities for working with APORT trees.
 * Only depends on AportConfig, through the factory.
 *
 * @category Services
 * @since 0.1.0
 */
export class AportService extends Context.Tag("@services/AportService")<
  AportService,
  {
    readonly make: <T>(
      makeDefault: LazyArg<T>
    ) => Effect.Effect<Aport.AportTree<T>>;
    readonly insert: <T>(
      tree: Aport.AportTree<T>,
      key: Aport.KeyInput,
      value: T
    ) => void;
    readonly getOrCreate: <T>(
      tree: Aport.AportTree<T>,
      key: Aport.KeyInput
    ) => Aport.Entry<T>;
    readonly erase: <T>(tree: Aport.AportTree<T>, key: Aport.KeyInput) => void;
    readonly eraseAt: <T>(
      tree: Aport.AportTree<T>,
      cursor: Aport.Cursor
    ) => Aport.Cursor;
    readonly contains: <T>(
      tree: Aport.AportTree<T>,
      key: Aport.KeyInput
    ) => boolean;
    readonly getOption: <T>(
      tree: Aport.AportTree<T>,
      key: Aport.KeyInput
    ) => Option.Option<T>;
    readonly get: <T>(
      tree: Aport.AportTree<T>,
      key: Aport.KeyInput
    ) => Effect.Effect<T, Aport.KeyNotFoundError>;
    readonly getEntry: <T>(
      tree: Aport.AportTree<T>,
      key: Aport.KeyInput
    ) => Effect.Effect<Aport.Entry<T>, Aport.KeyNotFoundError>;
    readonly modify: <T>(
      tree: Aport.AportTree<T>,
      key: Aport.KeyInput,
      f: (value: T) => T
    ) => Effect.Effect<T, Aport.KeyNotFoundError>;
    readonly length: <T>(tree: Aport.AportTree<T>) => number;
    readonly begin: <T>(tree: Aport.AportTree<T>) => Aport.Cursor;
    readonly end: () => Aport.Cursor;
    readonly isEnd: (cursor: Aport.Cursor) => boolean;
    readonly next: <T>(
      tree: Aport.AportTree<T>,
      cursor: Aport.Cursor
    ) => Aport.Cursor;
    readonly current: <T>(
      tree: Aport.AportTree<T>,
      cursor: Aport.Cursor
    ) => Option.Option<Aport.Entry<T>>;
    readonly entries: <T>(
      tree: Aport.AportTree<T>
    ) => Generator<Aport.Entry<T>, void, undefined>;
    readonly clone: <T>(
      source: Aport.AportTree<T>,
      options?: CloneOptions<T>
    ) => Aport.AportTree<T>;
    readonly move: <T>(source: Aport.AportTree<T>) => Aport.AportTree<T>;
    readonly clear: <T>(tree: Aport.AportTree<T>) => void;
    readonly displayTree: <T>(
      tree: Aport.AportTree<T>,
      formatValue?: (value: T) => string
    ) => string;
    readonly displayCompact: <T>(tree: Aport.AportTree<T>) => string;
    readonly collectStats: <T>(tree: Aport.AportTree<T>) => TreeStats;
    readonly logStats: <T>(tree: Aport.AportTree<T>) => Effect.Effect<void>;
  }
>() {}

/**
 * Live implementation of unified APORT Service
 *
 * Composes all individual APORT capabilities into a single cohesive service.
 *
 * @category Services
 * @since 0.1.0
 */
export const AportServiceLive = Layer.effect(
  AportService,
  Effect.gen(function* () {
    const factory = yield* AportFactory;
    const insert = yield* AportInsert;
    const erase = yield* AportErase;
    const query = yield* AportQuery;
    const iteration = yield* AportIteration;
    const copy = yield* AportCopy;
    const display = yield* AportDisplay;

    return AportService.of({
      make: factory.make,
      insert: insert.insert,
      getOrCreate: insert.getOrCreate,
      erase: erase.erase,
      eraseAt: erase.eraseAt,
      contains: query.contains,
      getOption: query.getOption,
      get: query.get,
      getEntry: query.getEntry,
      modify: query.modify,
      length: (tree) => tree.length,
      begin: iteration.begin,
      end: iteration.end,
      isEnd: iteration.isEnd,
      next: iteration.next,
      current: iteration.current,
      entries: iteration.entries,
      clone: copy.clone,
      move: copy.move,
      clear: copy.clear,
      displayTree: display.displayTree,
      displayCompact: display.displayCompact,
      collectStats: display.collectStats,
      logStats: display.logStats,
    });
  })
).pipe(
  Layer.provide(
    Layer.mergeAll(
      AportFactoryLive,
      AportInsertLive,
      AportEraseLive,
      AportQueryLive,
      AportIterationLive,
      AportCopyLive,
      AportDisplayLive
    )
  )
);
