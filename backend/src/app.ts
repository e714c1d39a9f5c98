import express, { Request, Response } from "express";
import cors from "cors";
import { countriesRouter } from "./routes/countries.js";
import { forecastRouter } from "./routes/forecast.js";

export function createApp(frontendOrigin = "*") {
  const app = express();
  app.use(cors({ origin: frontendOrigin }));
  app.use(express.json());

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.use("/api/countries", countriesRouter);
  app.use("/api/forecast", forecastRouter);
  return app;
}
