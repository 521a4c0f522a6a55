/**
 * Billing Roll-up — Tests
 */

import { describe, it, expect } from "vitest";
import { rollUpCosts, rollUpServiceCosts } from "./costs.js";

describe("rollUpCosts", () => {
  it("should sum rows per resource including credits", () => {
    expect(
      rollUpCosts([
        { resourceId: "vm-1", service: "Compute Engine", cost: 120 },
        { resourceId: "vm-1", service: "Compute Engine", cost: 30, credits: -50 },
        { resourceId: "bucket-1", service: "Cloud Storage", cost: 12.5 },
      ]),
    ).toEqual({ "bucket-1": 12.5, "vm-1": 100 });
  });

  it("should skip rows without a resource id or with a non-finite cost", () => {
    expect(
      rollUpCosts([
        { resourceId: null, cost: 10 },
        { resourceId: "  ", cost: 10 },
        { resourceId: "vm-1", cost: Number.NaN },
        { resourceId: "vm-2", cost: 4 },
      ]),
    ).toEqual({ "vm-2": 4 });
  });

  it("should drop resources whose credits exceed their cost", () => {
    expect(rollUpCosts([{ resourceId: "vm-1", cost: 10, credits: -15 }])).toEqual({});
  });

  it("should trim resource ids", () => {
    expect(rollUpCosts([{ resourceId: " vm-1 ", cost: 3 }])).toEqual({ "vm-1": 3 });
  });
});

describe("rollUpServiceCosts", () => {
  it("should sum rows per service, highest first", () => {
    const costs = rollUpServiceCosts([
      { resourceId: "bucket-1", service: "Cloud Storage", cost: 12.5 },
      { resourceId: "vm-1", service: "Compute Engine", cost: 120 },
      { resourceId: "vm-1", service: "Compute Engine", cost: 30, credits: -50 },
      { resourceId: null, service: "Support", cost: 100 },
    ]);
    expect(Object.entries(costs)).toEqual([
      ["Compute Engine", 100],
      ["Support", 100],
      ["Cloud Storage", 12.5],
    ]);
  });

  it("should skip rows without a service and services credited below zero", () => {
    expect(
      rollUpServiceCosts([
        { resourceId: "vm-1", cost: 10 },
        { resourceId: "vm-2", service: " ", cost: 10 },
        { resourceId: "vm-3", service: "Cloud SQL", cost: 4, credits: -6 },
        { resourceId: "vm-4", service: " Cloud Run ", cost: Number.POSITIVE_INFINITY },
        { resourceId: "vm-5", service: " Cloud Run ", cost: 2 },
      ]),
    ).toEqual({ "Cloud Run": 2 });
  });
});
