import type { Request, RequestHandler, Response } from 'express';

type JsonRequestHandler = (req: Request, res: Response) => Promise<unknown>;

/**
 * Resolved values are sent as the JSON body unless the handler already
 * answered. Rejections are passed on to the error handler.
 */
export function asyncHandler(fn: JsonRequestHandler): RequestHandler {
  return (req, res, next) => {
    fn(req, res)
      .then((body) => {
        if (body !== undefined && !res.headersSent) {
          res.json(body);
        }
      })
      .catch(next);
  };
}
