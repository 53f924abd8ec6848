import { describe, it, expect } from "vitest";
import {
  APP_NAME,
  VERSION,
  AlertType,
  ExposureAggregator,
  RiskEngine,
  RiskReadModel,
  buildRiskEngineConfig,
  createChannelsFromConfig,
} from "../src/index";

describe("Index Module", () => {
  it("should export APP_NAME constant", () => {
    expect(APP_NAME).toBe("Brokerage Risk Engine");
  });

  it("should export VERSION constant", () => {
    expect(VERSION).toBe("1.0.0");
  });

  it("should expose the pipeline building blocks", () => {
    expect(typeof ExposureAggregator).toBe("function");
    expect(typeof RiskEngine).toBe("function");
    expect(typeof RiskReadModel).toBe("function");
    expect(typeof buildRiskEngineConfig).toBe("function");
    expect(typeof createChannelsFromConfig).toBe("function");
  });

  it("should expose the alert type enum", () => {
    expect(AlertType.HIGH_CLIENT_EXPOSURE).toBe("HIGH_CLIENT_EXPOSURE");
  });
});
