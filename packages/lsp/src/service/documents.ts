import { DocumentNotOpenError } from '../errors.js';

export interface DocumentHandle {
  readonly uri: string;
  readonly languageId: string;
  version: number;
  refCount: number;
}

export type OpenOutcome =
  | { kind: 'opened'; handle: DocumentHandle }
  | { kind: 'retained'; handle: DocumentHandle };

export type CloseOutcome =
  | { kind: 'closed'; handle: DocumentHandle }
  | { kind: 'released'; handle: DocumentHandle };

/**
 * Open-document bookkeeping for text synchronization. Versions start at 0
 * and grow by exactly one per change; a handle exists only while open.
 */
export class DocumentStore {
  private readonly handles = new Map<string, DocumentHandle>();

  open(uri: string, languageId: string): OpenOutcome {
    const existing = this.handles.get(uri);
    if (existing !== undefined) {
      existing.refCount += 1;
      return { kind: 'retained', handle: existing };
    }

    const handle: DocumentHandle = { uri, languageId, version: 0, refCount: 1 };
    this.handles.set(uri, handle);
    return { kind: 'opened', handle };
  }

  /** Bumps the version and returns the one to send with `didChange`. */
  nextVersion(uri: string): number {
    const handle = this.require(uri);
    handle.version += 1;
    return handle.version;
  }

  close(uri: string): CloseOutcome {
    const handle = this.require(uri);
    handle.refCount -= 1;
    if (handle.refCount > 0) {
      return { kind: 'released', handle };
    }
    this.handles.delete(uri);
    return { kind: 'closed', handle };
  }

  isOpen(uri: string): boolean {
    return this.handles.has(uri);
  }

  version(uri: string): number | undefined {
    return this.handles.get(uri)?.version;
  }

  openUris(): string[] {
    return [...this.handles.keys()].sort((a, b) => a.localeCompare(b));
  }

  clear(): void {
    this.handles.clear();
  }

  private require(uri: string): DocumentHandle {
    const handle = this.handles.get(uri);
    if (handle === undefined) {
      throw new DocumentNotOpenError(uri);
    }
    return handle;
  }
}
