import { describe, it, expect } from "vitest";
import { createTestContext, seedAccount } from "../../../__tests__/helpers.js";
import { accountCreateSchema, accountUpdateSchema } from "../schemas/accounts.schemas.js";
import { deleteAccount, getAccount, listAccounts, updateAccount } from "../services/accounts.service.js";
import { DuplicateKeyError, NotFoundError } from "../../../utils/errors.js";

describe("chart of accounts", () => {
  it("lists accounts in code order", async () => {
    const { ctx } = createTestContext();
    await seedAccount(ctx, "4000", "Sales");
    await seedAccount(ctx, "1000", "Cash");
    const accounts = await listAccounts(ctx);
    expect(accounts.map((account) => account.code)).toEqual(["1000", "4000"]);
  });

  it("keeps account codes unique", async () => {
    const { ctx } = createTestContext();
    await seedAccount(ctx, "1000", "Cash");
    await expect(seedAccount(ctx, "1000", "Bank")).rejects.toBeInstanceOf(DuplicateKeyError);
  });

  it("renames an account", async () => {
    const { ctx } = createTestContext();
    const account = await seedAccount(ctx, "1000", "Cash");
    const updated = await updateAccount(ctx, account.id, accountUpdateSchema.parse({ name: "Cash on hand" }));
    expect(updated).toMatchObject({ code: "1000", name: "Cash on hand", classification: "asset" });
  });

  it("deletes an unused account", async () => {
    const { ctx } = createTestContext();
    const account = await seedAccount(ctx, "1000", "Cash");
    expect(await deleteAccount(ctx, account.id)).toEqual({ id: account.id, deleted: true });
    await expect(getAccount(ctx, account.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("validates codes at the schema", () => {
    expect(accountCreateSchema.safeParse({ code: "10 00", name: "Cash", classification: "asset" }).success).toBe(false);
    expect(accountCreateSchema.safeParse({ code: "1000", name: "Cash", classification: "cash" }).success).toBe(false);
  });
});
