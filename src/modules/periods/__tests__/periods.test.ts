import { describe, it, expect } from "vitest";
import { createTestContext, seedTransaction } from "../../../__tests__/helpers.js";
import { periodCreateSchema, periodUpdateSchema } from "../schemas/periods.schemas.js";
import { createPeriod, deletePeriod, updatePeriod } from "../services/periods.service.js";
import { ConstraintViolation, ReferentialIntegrityError } from "../../../utils/errors.js";

const january = { startDate: "2024-01-01", endDate: "2024-01-31", periodType: "monthly" };

describe("accounting periods", () => {
  it("opens a period by default", async () => {
    const { ctx } = createTestContext();
    const period = await createPeriod(ctx, periodCreateSchema.parse(january));
    expect(period.state).toBe("open");
  });

  it("rejects a start after the end", async () => {
    const { ctx } = createTestContext();
    await expect(
      createPeriod(ctx, periodCreateSchema.parse({ ...january, startDate: "2024-02-01" })),
    ).rejects.toBeInstanceOf(ConstraintViolation);

    const period = await createPeriod(ctx, periodCreateSchema.parse(january));
    await expect(
      updatePeriod(ctx, period.id, periodUpdateSchema.parse({ endDate: "2023-12-31" })),
    ).rejects.toBeInstanceOf(ConstraintViolation);
  });

  it("closes a period", async () => {
    const { ctx } = createTestContext();
    const period = await createPeriod(ctx, periodCreateSchema.parse(january));
    const closed = await updatePeriod(ctx, period.id, periodUpdateSchema.parse({ state: "closed" }));
    expect(closed.state).toBe("closed");
  });

  it("blocks deleting a period that transactions use", async () => {
    const { ctx } = createTestContext();
    const period = await createPeriod(ctx, periodCreateSchema.parse(january));
    await seedTransaction(ctx, { periodId: period.id });
    await expect(deletePeriod(ctx, period.id)).rejects.toBeInstanceOf(ReferentialIntegrityError);
  });
});
