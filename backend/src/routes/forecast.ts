import { Router, Request, Response } from "express";
import { getConfig } from "../lib/config.js";
import { getDataset } from "../lib/dataset.js";
import { DataError, errorMessage } from "../lib/errors.js";
import {
  forecastOptionsFromConfig,
  prepareCountryContext,
} from "../services/countryContext.js";

export const forecastRouter = Router();

function countryParam(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function respondWithForecast(
  res: Response,
  requested: string | undefined
): void {
  try {
    const dataset = getDataset();
    const options = forecastOptionsFromConfig(getConfig());
    const context = prepareCountryContext(dataset, requested, options);

    if (requested !== undefined && requested !== context.country) {
      console.log(
        `[Forecast] Unknown country "${requested}", using ${context.country}`
      );
    }
    console.log(
      `[Forecast] ${context.country}: r=${context.growthRate}, horizon=${options.horizon}, checkpoints=${context.forecastTable.length}`
    );

    res.json({
      requestedCountry: requested ?? dataset.defaultCountry,
      ...context,
    });
  } catch (e: unknown) {
    if (e instanceof DataError) {
      console.warn(`[Forecast] Invalid data for ${e.country}: ${e.message}`);
      res
        .status(422)
        .json({ error: "Invalid historical data", details: e.message });
      return;
    }
    console.error("[Forecast] Error:", errorMessage(e));
    res
      .status(500)
      .json({ error: "Failed to build forecast", details: errorMessage(e) });
  }
}

/**
 * GET /api/forecast?country=Indonesia
 * Exponential and logistic forecast for one country
 */
forecastRouter.get("/", (req: Request, res: Response) => {
  respondWithForecast(res, countryParam(req.query.country));
});

/**
 * POST /api/forecast
 * Body: { country: "Indonesia" }
 */
forecastRouter.post("/", (req: Request, res: Response) => {
  const body: unknown = req.body;
  const country =
    typeof body === "object" && body !== null && "country" in body
      ? countryParam(body.country)
      : undefined;
  respondWithForecast(res, country);
});
