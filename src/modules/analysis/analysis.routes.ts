import {
  Router,
  type NextFunction,
  type Request,
  type Response,
  type Router as ExpressRouter,
} from "express";
import multer from "multer";
import { handleAnalyze } from "./analysis.controller";
import { FileTooLargeError, UnexpectedUploadError } from "./analysis.errors";

export interface AnalysisRouterOptions {
  uploadLimitBytes: number;
}

export function createAnalysisRouter(opts: AnalysisRouterOptions): ExpressRouter {
  const router: ExpressRouter = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: opts.uploadLimitBytes, files: 1 },
  }).single("file");

  // Multer failures are translated into domain errors before the controller runs.
  const receiveFile = (req: Request, res: Response, next: NextFunction) => {
    upload(req, res, (err: unknown) => {
      if (err instanceof multer.MulterError) {
        if (err.code === "LIMIT_FILE_SIZE") {
          return next(new FileTooLargeError(opts.uploadLimitBytes));
        }
        return next(new UnexpectedUploadError(`${err.message} (${err.field ?? "unknown field"})`));
      }
      return next(err);
    });
  };

  /**
   * ANALYZE workbook
   * POST /analyze
   */
  router.post("/analyze", receiveFile, handleAnalyze);

  return router;
}
