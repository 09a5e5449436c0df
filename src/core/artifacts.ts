import {createWriteStream} from 'node:fs'
import {mkdir} from 'node:fs/promises'
import {dirname, join} from 'node:path'
import type {Readable} from 'node:stream'
import {pipeline} from 'node:stream/promises'

/**
 * Destination for files collected while a step runs (build logs, …).
 */
export type ArtifactSink = {
  /**
   * Stores the content of `stream` under `relativePath`.
   */
  write(relativePath: string, stream: Readable): Promise<void>;
}

/**
 * Writes artifacts below a directory, typically `$ARTIFACT_DIR`.
 */
export class DirectoryArtifactSink implements ArtifactSink {
  constructor(readonly root: string) {}

  async write(relativePath: string, stream: Readable): Promise<void> {
    const target = join(this.root, relativePath)
    await mkdir(dirname(target), {recursive: true})
    await pipeline(stream, createWriteStream(target))
  }
}
