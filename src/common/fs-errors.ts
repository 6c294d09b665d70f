/** `code` of a Node system error; fs rejections are not always `instanceof Error` under Jest. */
export const errorCode = (err: unknown): string | undefined =>
  typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string' ? err.code : undefined

export const isMissingPathError = (err: unknown): boolean => {
  const code = errorCode(err)
  return code === 'ENOENT' || code === 'ENOTDIR'
}

export const errorMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message
  }
  return String(err)
}
