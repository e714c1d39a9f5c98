import { Router, Request, Response } from "express";
import { getDataset } from "../lib/dataset.js";
import { errorMessage } from "../lib/errors.js";

export const countriesRouter = Router();

/**
 * GET /api/countries
 * All country names in the dataset, for the country selector
 */
countriesRouter.get("/", (_req: Request, res: Response) => {
  try {
    const dataset = getDataset();
    res.json({
      countries: dataset.countries(),
      defaultCountry: dataset.defaultCountry,
    });
  } catch (e: unknown) {
    console.error("[Countries] Error:", errorMessage(e));
    res
      .status(500)
      .json({ error: "Failed to list countries", details: errorMessage(e) });
  }
});
