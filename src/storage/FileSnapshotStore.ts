import { promises as fs } from 'fs'
import path from 'path'
import { SnapshotStore, fromSerializable, toSerializable } from './SnapshotStore'
import { Snapshot, SnapshotFileSchema } from '../contracts'
import { debugLog, errorMessage } from '../debug/debugLog'

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'

export class FileSnapshotStore implements SnapshotStore {
  private filePath: string

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath)
  }

  getFilePath(): string {
    return this.filePath
  }

  async load(): Promise<Snapshot> {
    let data: string
    try {
      data = await fs.readFile(this.filePath, 'utf8')
    } catch (error) {
      if (!isMissingFile(error)) {
        console.warn(`Cannot read snapshot file ${this.filePath}: ${errorMessage(error)}`)
      }
      debugLog({
        event: 'snapshot_read_skipped',
        file: this.filePath,
        error: errorMessage(error),
      })
      return new Map()
    }

    try {
      const parsed: unknown = JSON.parse(data)
      return fromSerializable(SnapshotFileSchema.parse(parsed))
    } catch (error) {
      // Unreadable snapshot degrades to a first run
      console.warn(`Ignoring unreadable snapshot file ${this.filePath}: ${errorMessage(error)}`)
      debugLog({
        event: 'snapshot_corrupt',
        file: this.filePath,
        error: errorMessage(error),
      })
      return new Map()
    }
  }

  async save(snapshot: Snapshot): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true })

    // Write beside the target and rename so an interrupt never leaves half a file
    const tempPath = `${this.filePath}.tmp`
    await fs.writeFile(
      tempPath,
      JSON.stringify(toSerializable(snapshot), null, 2),
      'utf8'
    )
    await fs.rename(tempPath, this.filePath)

    debugLog({
      event: 'snapshot_saved',
      file: this.filePath,
      itemCount: snapshot.size,
    })
  }
}
