export async function register() {
  // Only open storage on the Node.js server (not during build or in Edge runtime)
  if (process.env.NEXT_RUNTIME === 'nodejs') {
    const { getGrowthSession } = await import('@/lib/growth-session')
    const { loadConfig } = await import('@/lib/config')
    const { logger } = await import('@/lib/logger')

    // Configuration or reference data problems stop the server here
    await getGrowthSession()
    logger.info('general', `Growth tracker ready on port ${loadConfig().port}`)
  }
}
