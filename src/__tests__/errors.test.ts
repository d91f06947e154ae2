import { describe, it, expect } from 'vitest'
import { CREATE_FUNCTION_HINT, mapLambdaError } from '../utils/errors'

describe('mapLambdaError', () => {
  it('recognises common AWS CLI failures', () => {
    expect(mapLambdaError('An error occurred (AccessDeniedException) when calling the UpdateFunctionCode operation').code).toBe('LAMBDA_ACCESS_DENIED')
    expect(mapLambdaError('An error occurred (ExpiredTokenException): The security token included in the request is expired').code).toBe('AWS_CREDENTIALS_EXPIRED')
    expect(mapLambdaError('An error occurred (TooManyRequestsException): Rate exceeded').code).toBe('LAMBDA_THROTTLED')
    expect(mapLambdaError('An error occurred (RequestEntityTooLargeException)').code).toBe('LAMBDA_PACKAGE_TOO_LARGE')
  })

  it('falls back to the first stderr line and the create-first hint', () => {
    const info = mapLambdaError('Could not connect to the endpoint URL\nsecond line')
    expect(info).toEqual({ code: 'LAMBDA_UPDATE_FAILED', message: 'Could not connect to the endpoint URL', remedy: CREATE_FUNCTION_HINT })
  })

  it('uses a generic message for empty output', () => {
    expect(mapLambdaError('').message).toBe('Update call failed (function may not exist)')
  })
})
