import { Request, Response, NextFunction } from 'express'
import { ZodError } from 'zod'
import { ResponseError } from '@utils/ResponseError'
import { env } from '@config/env'

export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction
) {
  if (res.headersSent) {
    return next(error)
  }

  const isDevelopment = env.nodeEnv === 'development'
  let statusCode = 500
  let message = 'Internal server error'

  if (error instanceof ZodError) {
    statusCode = 400
    message = error.errors
      .map(e => `${e.path.join('.')} invalid: ${e.message}`)
      .join(', ')
  } else if (error instanceof SyntaxError && 'body' in error) {
    // Malformed JSON rejected by express.json()
    statusCode = 400
    message = 'Malformed JSON body'
  } else if (error instanceof ResponseError) {
    statusCode = error.status
    message = error.message
  } else if (isDevelopment && error instanceof Error) {
    message = error.message
  }

  console.error(`[Error] ${statusCode} - ${message}`, {
    path: req.path,
    method: req.method,
    stack: isDevelopment ? error.stack : undefined,
  })

  res.status(statusCode).json({
    message,
    ...(isDevelopment && { stack: error.stack }),
  })
}
