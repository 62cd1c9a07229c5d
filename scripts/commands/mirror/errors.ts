export type MirrorErrorKind =
  | 'FileNotFound'
  | 'NoMatchFound'
  | 'NoServersLoaded'
  | 'NoWorkingServerFound'
  | 'InvalidServerBase'
  | 'InvalidConfig'

export class MirrorError extends Error {
  readonly kind: MirrorErrorKind

  constructor(kind: MirrorErrorKind, message: string) {
    super(message)
    this.name = 'MirrorError'
    this.kind = kind
  }
}

export function isMirrorError(err: unknown): err is MirrorError {
  return err instanceof MirrorError
}
