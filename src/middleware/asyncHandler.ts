import { Request, Response, NextFunction, RequestHandler } from "express";

// Wraps an async route handler and forwards errors to the error handler,
// where an AppError becomes the `{ success: false, code, message }` body
const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
};

export default asyncHandler;
