import { NodeContext } from "@effect/platform-node"
import type { PlatformError } from "@effect/platform/Error"
import { FileSystem, type FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path, type Path as PathService } from "@effect/platform/Path"
import { Effect } from "effect"

/** Services and a scratch directory handed to one integration case. */
export interface Workspace {
  readonly fs: FileSystemService
  readonly path: PathService
  readonly tempDir: string
}

/**
 * Run `use` inside a fresh jsonode-prefixed temp directory that is removed
 * when the case finishes, whether it succeeds or fails.
 */
export const withTempDir = <A, E, R>(
  use: (workspace: Workspace) => Effect.Effect<A, E, R>
): Effect.Effect<A, E | PlatformError, R | FileSystemService | PathService> =>
  Effect.scoped(
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystem)
      const path = yield* _(Path)
      const tempDir = yield* _(fs.makeTempDirectoryScoped({ prefix: "jsonode-" }))
      return yield* _(use({ fs, path, tempDir }))
    })
  )

export const provideNodeContext = <A, E, R>(
  effect: Effect.Effect<A, E, R>
): Effect.Effect<A, E, Exclude<R, NodeContext.NodeContext>> => Effect.provide(effect, NodeContext.layer)
