import express from "express";
import type { NextFunction, Request, Response } from "express";
import { ZodError, z } from "zod";
import { LedgerError } from "../engine/index.js";
import type { LedgerErrorCode } from "../engine/index.js";
import type { Services } from "../services/index.js";
import { BILLING_CYCLES, SPLIT_METHODS } from "../types/index.js";

const minorUnits = z.number().int().nonnegative();
const currencyCode = z.string().length(3).toUpperCase();
const isoDate = z.coerce.date();

const participantBody = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1, "Please enter a name"),
  phone: z.string().optional(),
});

const groupBody = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1, "Please enter a group name"),
  members: z.array(z.string().min(1)).default([]),
});

const memberBody = z.object({
  participantId: z.string().min(1),
  name: z.string().min(1).optional(),
});

const payerSchema = z.object({
  participantId: z.string().min(1),
  amount: minorUnits,
});

export const transactionBody = z.object({
  id: z.string().min(1).optional(),
  title: z.string().min(1, "Please enter a title"),
  totalAmount: minorUnits,
  currency: currencyCode.optional(),
  date: isoDate.optional(),
  splitMethod: z.enum(SPLIT_METHODS),
  participants: z.array(z.string().min(1)).min(1, "Select at least one person to split with"),
  rawInputs: z.record(z.number()).optional(),
  payers: z.array(payerSchema).optional(),
  paidBy: z.string().min(1).optional(),
  note: z.string().optional(),
  groupId: z.string().min(1).optional(),
});

const transactionPatch = z.object({
  title: z.string().min(1).optional(),
  totalAmount: minorUnits.optional(),
  currency: currencyCode.optional(),
  date: isoDate.optional(),
  note: z.string().nullable().optional(),
  split: z
    .object({
      method: z.enum(SPLIT_METHODS),
      participants: z.array(z.string().min(1)).min(1),
      rawInputs: z.record(z.number()).optional(),
    })
    .optional(),
  payers: z.array(payerSchema).optional(),
});

export const settlementBody = z.object({
  otherId: z.string().min(1),
  currency: currencyCode.optional(),
  amount: z.number().int().positive().optional(),
  note: z.string().optional(),
  groupId: z.string().min(1).optional(),
});

const settleAllBody = z.object({
  participantIds: z.array(z.string().min(1)).optional(),
  note: z.string().optional(),
  groupId: z.string().min(1).optional(),
});

const subscriptionBody = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  amount: z.number().int().positive(),
  currency: currencyCode.optional(),
  cycle: z.enum(BILLING_CYCLES),
  customCycleDays: z.number().int().positive().optional(),
  isShared: z.boolean().optional(),
  subscribers: z.array(z.string().min(1)).optional(),
  startDate: isoDate.optional(),
});

const subscriptionPaymentBody = z.object({
  payerId: z.string().min(1).optional(),
  amount: z.number().int().positive().optional(),
  date: isoDate.optional(),
  note: z.string().optional(),
});

const subscriptionSettlementBody = z.object({
  memberId: z.string().min(1),
  amount: z.number().int().positive().optional(),
  note: z.string().optional(),
});

const STATUS_BY_CODE: Record<LedgerErrorCode, number> = {
  INVALID_SPLIT_INPUT: 400,
  INVALID_TRANSACTION: 400,
  INVALID_AMOUNT: 400,
  INVALID_PARTICIPANT_PAIR: 400,
  NO_OUTSTANDING_BALANCE: 409,
  NOT_FOUND: 404,
};

export interface HttpError {
  status: number;
  body: { error: string; message: string; issues?: string[] };
}

export function toHttpError(error: unknown): HttpError {
  if (error instanceof LedgerError) {
    return {
      status: STATUS_BY_CODE[error.code],
      body: { error: error.code, message: error.message },
    };
  }

  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: "VALIDATION_ERROR",
        message: "Invalid request body",
        issues: error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`),
      },
    };
  }

  return {
    status: 500,
    body: { error: "INTERNAL_ERROR", message: "Something went wrong" },
  };
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function asyncHandler(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function createApp(services: Services, options: { currentUserId: string }) {
  const app = express();
  app.use(express.json());

  const viewerOf = (req: Request) => req.header("x-viewer-id") || options.currentUserId;

  // Health check
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post(
    "/participants",
    asyncHandler(async (req, res) => {
      const participant = await services.participants.createParticipant(participantBody.parse(req.body));
      res.status(201).json(participant);
    })
  );

  app.get(
    "/participants",
    asyncHandler(async (_req, res) => {
      res.json(await services.participants.getParticipants());
    })
  );

  app.get(
    "/participants/:id/balance",
    asyncHandler(async (req, res) => {
      const balance = await services.balances.getPersonBalance(viewerOf(req), req.params.id);
      res.json({ participantId: req.params.id, balance });
    })
  );

  app.get(
    "/participants/:id/timeline",
    asyncHandler(async (req, res) => {
      res.json(await services.balances.getTimeline(viewerOf(req), req.params.id));
    })
  );

  app.post(
    "/groups",
    asyncHandler(async (req, res) => {
      const body = groupBody.parse(req.body);
      const group = await services.groups.createGroup({
        id: body.id,
        name: body.name,
        creatorId: viewerOf(req),
        members: body.members,
      });
      res.status(201).json(group);
    })
  );

  app.post(
    "/groups/:id/members",
    asyncHandler(async (req, res) => {
      const body = memberBody.parse(req.body);
      res.json(await services.groups.addMember(req.params.id, body.participantId, body.name));
    })
  );

  app.get(
    "/groups/:id/balances",
    asyncHandler(async (req, res) => {
      res.json(await services.balances.getGroupBalances(req.params.id, viewerOf(req)));
    })
  );

  app.post(
    "/transactions",
    asyncHandler(async (req, res) => {
      const body = transactionBody.parse(req.body);
      const result = await services.transactions.createTransaction({
        ...body,
        createdBy: viewerOf(req),
      });
      res.status(201).json(result);
    })
  );

  app.get(
    "/transactions/:id",
    asyncHandler(async (req, res) => {
      const transaction = await services.transactions.getTransaction(req.params.id);
      if (!transaction) {
        res.status(404).json({ error: "NOT_FOUND", message: `Transaction ${req.params.id} not found` });
        return;
      }
      res.json(transaction);
    })
  );

  app.patch(
    "/transactions/:id",
    asyncHandler(async (req, res) => {
      const changes = transactionPatch.parse(req.body);
      res.json(await services.transactions.updateTransaction(req.params.id, changes));
    })
  );

  app.delete(
    "/transactions/:id",
    asyncHandler(async (req, res) => {
      await services.transactions.deleteTransaction(req.params.id);
      res.status(204).end();
    })
  );

  app.get(
    "/summary",
    asyncHandler(async (req, res) => {
      res.json(await services.balances.getHomeSummary(viewerOf(req)));
    })
  );

  app.post(
    "/settlements",
    asyncHandler(async (req, res) => {
      const body = settlementBody.parse(req.body);
      const result = await services.settlements.settleUp({ ...body, viewerId: viewerOf(req) });
      res.status(201).json(result);
    })
  );

  app.post(
    "/settlements/settle-all",
    asyncHandler(async (req, res) => {
      const body = settleAllBody.parse(req.body ?? {});
      const settlements = await services.settlements.settleAll({ ...body, viewerId: viewerOf(req) });
      res.status(201).json({ settlements });
    })
  );

  app.post(
    "/subscriptions",
    asyncHandler(async (req, res) => {
      const subscription = await services.subscriptions.createSubscription(
        subscriptionBody.parse(req.body)
      );
      res.status(201).json(subscription);
    })
  );

  app.post(
    "/subscriptions/:id/payments",
    asyncHandler(async (req, res) => {
      const body = subscriptionPaymentBody.parse(req.body ?? {});
      const payment = await services.subscriptions.recordPayment({
        ...body,
        subscriptionId: req.params.id,
        payerId: body.payerId ?? viewerOf(req),
      });
      res.status(201).json(payment);
    })
  );

  app.get(
    "/subscriptions/:id/balances",
    asyncHandler(async (req, res) => {
      res.json(await services.subscriptions.getBalances(req.params.id, viewerOf(req)));
    })
  );

  app.post(
    "/subscriptions/:id/settlements",
    asyncHandler(async (req, res) => {
      const body = subscriptionSettlementBody.parse(req.body);
      const result = await services.subscriptions.settle({
        ...body,
        subscriptionId: req.params.id,
        viewerId: viewerOf(req),
      });
      res.status(201).json(result);
    })
  );

  app.get(
    "/subscriptions/:id/payments.csv",
    asyncHandler(async (req, res) => {
      const csv = await services.subscriptions.exportPayments(req.params.id, viewerOf(req));
      res.type("text/csv").send(csv);
    })
  );

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: "NOT_FOUND", message: "Endpoint not found" });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toHttpError(error);
    if (status >= 500) {
      console.error("❌ Unhandled API error:", error);
    }
    res.status(status).json(body);
  });

  return app;
}
