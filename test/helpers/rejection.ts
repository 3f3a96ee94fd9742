/**
 * Awaits a promise that must reject and hands back what it rejected with.
 */
export async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (error) {
    return error
  }

  throw new Error('expected promise to reject')
}
