import { Request, Response, NextFunction } from "express";
import { GeoService } from "../services/geo-service";
import { ResponseAssembler } from "../services/response-assembler";
import { clientAddress } from "../services/client-ip";
import { InvalidHostError } from "../models/errors";

export interface GeoControllerOptions {
  trustProxyHeaders: boolean;
}

export class GeoController {
  constructor(
    private readonly geoService: GeoService,
    private readonly options: GeoControllerOptions
  ) {}

  // GET /:host and GET /api/:host
  lookupHost = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { host } = req.params;
      console.log(`Looking up geolocation for host: ${host}`);

      const result = await this.geoService.query(host);
      res.status(200).json(ResponseAssembler.assemble(result));
    } catch (error) {
      next(error);
    }
  };

  // GET /api?host=x.x.x.x, falling back to the client address
  lookupQuery = async (req: Request, res: Response, next: NextFunction) => {
    const { host } = req.query;
    if (host === undefined) {
      this.lookupClient(req, res, next);
      return;
    }

    try {
      if (typeof host !== "string") {
        throw new InvalidHostError(String(host), "host must be a single value");
      }
      console.log(`Looking up geolocation for host: ${host}`);

      const result = await this.geoService.query(host);
      res.status(200).json(ResponseAssembler.assemble(result));
    } catch (error) {
      next(error);
    }
  };

  // GET /
  lookupClient = (req: Request, res: Response, next: NextFunction) => {
    try {
      const address = clientAddress(
        req.headers,
        req.socket.remoteAddress,
        this.options.trustProxyHeaders
      );
      if (!address) {
        throw new InvalidHostError("", "client address is unknown");
      }
      console.log(`Looking up geolocation for client: ${address.toString()}`);

      const result = this.geoService.queryAddress(address);
      res.status(200).json(ResponseAssembler.assemble(result));
    } catch (error) {
      next(error);
    }
  };
}
