import * as cheerio from 'cheerio'
import { createLogger } from '@tubeveil/logger'
import { errorMessage } from '../utils/errors.js'
import type { BlockReason } from './types.js'

const logger = createLogger('BlockDetector')

/** A real watch page carries far more text than any interstitial. */
const CONTENT_PAGE_TEXT_LENGTH = 10000

const BOT_CHECK_PHRASES = ["confirm you're not a bot", 'confirm you’re not a bot', 'confirm that you are not a robot']
const UNUSUAL_TRAFFIC_PHRASES = ['unusual traffic from your computer network', 'our systems have detected unusual traffic']

const hostOf = (url: string): string => {
  try {
    return new URL(url).hostname
  } catch {
    return ''
  }
}

/**
 * Recognizes pages served instead of the requested video: the cookie consent
 * wall, the sign-in bot check, reCAPTCHA and the "unusual traffic" page.
 */
export class BlockDetector {
  async detect(url: string, html: string): Promise<BlockReason | undefined> {
    try {
      const $ = cheerio.load(html)
      const pageText = $('body').text().replace(/\s+/g, ' ').toLowerCase()
      const host = hostOf(url)

      // 1. Consent wall, either redirected or rendered in place
      if (host.startsWith('consent.')) {
        logger.debug('Consent redirect detected', host)
        return 'consent'
      }
      const consentForm = $('form[action*="consent.youtube.com"], form[action*="consent.google.com"]')
      if (consentForm.length > 0 && pageText.length < CONTENT_PAGE_TEXT_LENGTH) {
        logger.debug('Consent form detected')
        return 'consent'
      }

      // 2. Google's "sorry" page
      if (new URL(url, 'https://www.youtube.com').pathname.startsWith('/sorry/')) {
        return 'unusual-traffic'
      }
      if (UNUSUAL_TRAFFIC_PHRASES.some(phrase => pageText.includes(phrase))) {
        logger.debug('Unusual traffic page detected')
        return 'unusual-traffic'
      }

      // 3. reCAPTCHA challenge frame (the invisible anchor badge does not block)
      const challengeFrame = $('iframe[src*="recaptcha/api2/bframe"], iframe[src*="recaptcha/enterprise/bframe"]')
      const recaptchaForm = $('#recaptcha, .g-recaptcha, form#captcha-form')
      if (challengeFrame.length > 0 || recaptchaForm.length > 0) {
        if (pageText.length > CONTENT_PAGE_TEXT_LENGTH) {
          logger.warn('reCAPTCHA markup found on a full page, ignoring')
          return undefined
        }
        logger.debug('reCAPTCHA challenge detected')
        return 'recaptcha'
      }

      // 4. Sign-in bot check shown in place of the player
      if (BOT_CHECK_PHRASES.some(phrase => pageText.includes(phrase))) {
        logger.debug('Bot check detected')
        return 'bot-check'
      }

      return undefined
    } catch (error) {
      logger.debug('Block detection failed:', errorMessage(error))
      return undefined
    }
  }
}
