export class ResponseError extends Error {
  status: number

  constructor(message: string, status: number) {
    super(message)
    this.status = status
    this.name = 'ResponseError'
  }
}

export class BadRequestError extends ResponseError {
  constructor(message: string = 'Bad request') {
    super(message, 400)
    this.name = 'BadRequestError'
  }
}

export class UnauthorizedError extends ResponseError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401)
    this.name = 'UnauthorizedError'
  }
}

export class NotFoundError extends ResponseError {
  constructor(message: string = 'Not found') {
    super(message, 404)
    this.name = 'NotFoundError'
  }
}

export class TooManyRequestsError extends ResponseError {
  constructor(message: string = 'Too many requests') {
    super(message, 429)
    this.name = 'TooManyRequestsError'
  }
}

// Provider detail is logged where the failure happens, never sent to the client
export class SmsDeliveryError extends ResponseError {
  constructor(message: string = 'Failed to send OTP. Please try again later.') {
    super(message, 502)
    this.name = 'SmsDeliveryError'
  }
}
