// src/http/routes/accountRoutes.ts

/**
 * Account routes
 *
 * Thin HTTP boundary: declared parameters -> validation stage -> AccountService -> JSON.
 * Parameter failures are rendered with the standard error envelope through the custom
 * error handler hook of the validation stage.
 */

import { Router } from 'express';
import type { Request, RequestHandler } from 'express';

import type { AccountService } from '../../accounts/application/AccountService';
import type { ValidationPolicy, ValidationSessionError } from '../../validation';
import type { ErrorResponse } from '../middleware/validateParameters';
import { body, defineParameters, file, form, param, query, route, t } from '../../validation';
import { parameterErrorEnvelope } from '../errors/errorEnvelope';
import { withParameters } from '../middleware/validateParameters';
import type {} from '../requestContext';

export type AccountServicePort = Pick<
  AccountService,
  'updateAccount' | 'getAccount' | 'attachAvatar'
>;

export type AccountRoutesOptions = {
  policy: ValidationPolicy;
  uploads: RequestHandler;
};

export const AVATAR_CONTENT_TYPES = ['image/png', 'image/jpeg', 'image/webp'] as const;
export const AVATAR_MAX_BYTES = 1024 * 1024;

export const updateAccountParams = defineParameters(
  param('id', t.int(), route()),
  param('username', t.str(), body({ minStrLength: 5, blacklist: '<>' })),
  param('age', t.int(), body({ min: 18, max: 99 })),
  param('nicknames', t.list(t.str()), body()),
  param('passwordExpiry', t.union(t.int(), t.float()), body()),
  param('isAdmin', t.bool(), query({ default: false })),
);

export const getAccountParams = defineParameters(param('id', t.int(), route({ min: 1 })));

export const uploadAvatarParams = defineParameters(
  param('id', t.int(), route({ min: 1 })),
  param(
    'avatar',
    t.file(),
    file({ contentTypes: AVATAR_CONTENT_TYPES, maxSize: AVATAR_MAX_BYTES }),
  ),
  param('caption', t.optional(t.str()), form({ maxStrLength: 80 })),
);

function renderParameterError(err: ValidationSessionError, req: Request): ErrorResponse {
  return {
    status: err.isClientError ? 400 : 500,
    body: parameterErrorEnvelope(err, req.correlationId),
  };
}

export function createAccountRoutes(
  accounts: AccountServicePort,
  options: AccountRoutesOptions,
): Router {
  const router = Router();
  const validation = { policy: options.policy, errorHandler: renderParameterError };

  router.post(
    '/v1/accounts/:id',
    withParameters(
      updateAccountParams,
      async (params, _req, res) => {
        const account = await accounts.updateAccount(params);
        return res.status(200).json(account);
      },
      validation,
    ),
  );

  router.get(
    '/v1/accounts/:id',
    withParameters(
      getAccountParams,
      async ({ id }, _req, res) => {
        const account = await accounts.getAccount(id);
        return res.status(200).json(account);
      },
      validation,
    ),
  );

  router.post(
    '/v1/accounts/:id/avatar',
    options.uploads,
    withParameters(
      uploadAvatarParams,
      async ({ id, avatar, caption }, _req, res) => {
        const meta = await accounts.attachAvatar(id, {
          filename: avatar.originalname,
          contentType: avatar.mimetype,
          sizeBytes: avatar.size,
          ...(caption !== null ? { caption } : {}),
        });
        return res.status(201).json(meta);
      },
      validation,
    ),
  );

  return router;
}
