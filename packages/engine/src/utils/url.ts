import { createLogger } from '@tubeveil/logger'
import { parse as parseDomain } from 'psl'

const logger = createLogger('url')

/** Registrable domain of a URL or bare host, `''` when it cannot be determined. */
export const extractDomain = (url: string): string => {
  try {
    let candidate = url.trim().replace(/^\.+/, '')
    if (candidate.length === 0) {
      return ''
    }

    if (!candidate.startsWith('http://') && !candidate.startsWith('https://')) {
      candidate = `https://${candidate}`
    }

    const urlObj = new URL(candidate)
    const parsed = parseDomain(urlObj.hostname)
    if (!('listed' in parsed)) {
      logger.debug('Could not extract domain', { url, error: parsed.error })
      return ''
    }

    return parsed.domain || ''
  } catch (error) {
    logger.debug('Could not extract domain', { url, error: String(error) })
    return ''
  }
}

export const domainMatches = (url: string, target: string): boolean => {
  const domain = extractDomain(url)
  return domain !== '' && domain === extractDomain(target)
}
