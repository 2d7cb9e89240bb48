import { Request, Response, NextFunction, RequestHandler } from 'express'
import { IncomingHttpHeaders } from 'http'
import { z, ZodType, ZodTypeDef } from 'zod'
import { AuthPayload } from './auth'
import { UnauthorizedError } from '@utils/ResponseError'

type Input = Record<string, unknown>

export interface RequestContext {
  ip: string | undefined
  headers: IncomingHttpHeaders
}

export type RequestSchema<I extends Input> = ZodType<I, ZodTypeDef, unknown>

export type RequestCallback<I extends Input> = (
  req: I & RequestContext
) => Promise<unknown> | unknown

export type RequestCallbackAuth<I extends Input> = (
  req: I & RequestContext & { auth: AuthPayload }
) => Promise<unknown> | unknown

export interface Endpoint<I extends Input> {
  schema: RequestSchema<I>
  callback: RequestCallback<I>
}

export interface EndpointAuth<I extends Input> {
  schema: RequestSchema<I>
  callback: RequestCallbackAuth<I>
}

/** Schema for endpoints that read nothing from the request. */
export const noInput = z.object({})

export function endpoint<I extends Input>(
  callback: RequestCallback<I>,
  schema: RequestSchema<I>
): Endpoint<I> {
  return { callback, schema }
}

export function endpointAuth<I extends Input>(
  callback: RequestCallbackAuth<I>,
  schema: RequestSchema<I>
): EndpointAuth<I> {
  return { callback, schema }
}

// Only body, query and params reach the callback; each is replaced by its
// parsed form, so unknown keys are dropped.
function parseRequest<I extends Input>(schema: RequestSchema<I>, req: Request): I & RequestContext {
  const parsed = schema.parse({
    body: req.body,
    query: req.query,
    params: req.params,
  })

  return { ...parsed, ip: req.ip, headers: req.headers }
}

function respond(res: Response, result: unknown) {
  if (result !== undefined) {
    res.json(result)
  } else {
    res.status(200).end()
  }
}

export function endpointToArray<I extends Input>(
  ep: Endpoint<I>
): RequestHandler[] {
  const handler: RequestHandler = async (req: Request, res: Response, next: NextFunction) => {
    try {
      respond(res, await ep.callback(parseRequest(ep.schema, req)))
    } catch (error) {
      next(error)
    }
  }
  return [handler]
}

export function endpointToArrayAuth<I extends Input>(
  ep: EndpointAuth<I>
): RequestHandler[] {
  const handler: RequestHandler = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const auth = req.auth
      if (!auth) {
        throw new UnauthorizedError()
      }
      respond(res, await ep.callback({ ...parseRequest(ep.schema, req), auth }))
    } catch (error) {
      next(error)
    }
  }
  return [handler]
}
