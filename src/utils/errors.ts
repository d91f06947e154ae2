export interface ErrorInfo {
  readonly code: string
  readonly message: string
  readonly remedy?: string
}

/** Raised for failures that must stop the run before any unit is touched. */
export class PreflightError extends Error {
  public readonly remedy?: string

  constructor(message: string, remedy?: string) {
    super(message)
    this.name = 'PreflightError'
    this.remedy = remedy
  }
}

export const CREATE_FUNCTION_HINT = "Run 'aws lambda create-function' first or use infrastructure deployment"

function normalize(s: string): string {
  return (s || '').toLowerCase()
}

/**
 * Map AWS CLI stderr from a Lambda call to a stable code and a remedy.
 */
export function mapLambdaError(raw: string): ErrorInfo {
  const txt = normalize(raw)
  if (txt.includes('resourcenotfoundexception') || txt.includes('function not found')) {
    return {
      code: 'LAMBDA_FUNCTION_NOT_FOUND',
      message: 'The function does not exist in this account and region.',
      remedy: CREATE_FUNCTION_HINT
    }
  }
  if (txt.includes('expiredtoken') || txt.includes('token has expired') || txt.includes('security token included in the request is invalid')) {
    return {
      code: 'AWS_CREDENTIALS_EXPIRED',
      message: 'AWS credentials are expired or invalid.',
      remedy: "Refresh credentials (e.g. 'aws sso login') and retry"
    }
  }
  if (txt.includes('accessdenied') || txt.includes('not authorized to perform')) {
    return {
      code: 'LAMBDA_ACCESS_DENIED',
      message: 'The configured identity may not update this function.',
      remedy: 'Grant lambda:UpdateFunctionCode to the deploying identity'
    }
  }
  if (txt.includes('toomanyrequests') || txt.includes('throttl') || txt.includes('rate exceeded')) {
    return {
      code: 'LAMBDA_THROTTLED',
      message: 'The Lambda API throttled the request.',
      remedy: 'Wait a moment and deploy the failed functions again'
    }
  }
  if (txt.includes('requestentitytoolarge') || txt.includes('request must be smaller than')) {
    return {
      code: 'LAMBDA_PACKAGE_TOO_LARGE',
      message: 'The deployment package exceeds the direct upload limit.',
      remedy: 'Trim dependencies or upload the archive through S3'
    }
  }
  const firstLine: string = (raw || '').trim().split(/\r?\n/)[0] ?? ''
  return {
    code: 'LAMBDA_UPDATE_FAILED',
    message: firstLine.length > 0 ? firstLine : 'Update call failed (function may not exist)',
    remedy: CREATE_FUNCTION_HINT
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
