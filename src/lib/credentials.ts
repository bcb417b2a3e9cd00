import { ConfigurationError } from '@/lib/utils/errors'

export const CREDENTIAL_ENV_VAR = 'TE_API_KEY'

export interface Credential {
  readonly key: string
  readonly secret: string
}

/**
 * Parse a `key:secret` pair. Exactly one separator, both halves non-empty.
 */
export function parseCredential(raw: string | undefined): Credential {
  const trimmed = (raw ?? '').trim()
  if (!trimmed) {
    throw new ConfigurationError(`${CREDENTIAL_ENV_VAR} is required (e.g. ${CREDENTIAL_ENV_VAR}=your_key:your_secret)`)
  }
  const parts = trimmed.split(':')
  if (parts.length !== 2) {
    throw new ConfigurationError(`${CREDENTIAL_ENV_VAR} must contain exactly one ':' between key and secret`)
  }
  const [key = '', secret = ''] = parts
  if (!key || !secret) {
    throw new ConfigurationError(`${CREDENTIAL_ENV_VAR} key and secret must both be non-empty`)
  }
  return Object.freeze({ key, secret })
}

/** Value sent to the upstream in the `c` query parameter. */
export function toQueryValue(credential: Credential): string {
  return `${credential.key}:${credential.secret}`
}

export class CredentialHolder {
  private credential: Credential | undefined

  load(env: NodeJS.ProcessEnv = process.env): Credential {
    if (this.credential) {
      throw new ConfigurationError('Credential already loaded')
    }
    this.credential = parseCredential(env[CREDENTIAL_ENV_VAR])
    return this.credential
  }

  current(): Credential {
    if (!this.credential) {
      throw new ConfigurationError('Credential has not been loaded')
    }
    return this.credential
  }

  isLoaded(): boolean {
    return this.credential !== undefined
  }
}
