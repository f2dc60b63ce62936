import { Request, Response, NextFunction } from "express";
import { ResponseStatus } from "../../shared/errors/ResponseStatus";
import { AuthorizationService } from "./service/AuthorizationService";

export class AuthorizationController {
  constructor(private readonly authorizationService: AuthorizationService) {}

  async authorize(req: Request, res: Response, next: NextFunction) {
    try {
      const decision = await this.authorizationService.authorize(req.body);
      res.status(ResponseStatus.OK).json(decision);
    } catch (error) {
      next(error);
    }
  }

  async invalidate(req: Request, res: Response, next: NextFunction) {
    try {
      await this.authorizationService.invalidate(req.body);
      res.status(ResponseStatus.NO_CONTENT).send();
    } catch (error) {
      next(error);
    }
  }

  stats(_req: Request, res: Response) {
    res.status(ResponseStatus.OK).json(this.authorizationService.getStats());
  }
}
