import type { FastifyInstance } from "fastify";
import type { AppContext } from "../../context.js";
import { emptySchema, userProfileSchema } from "../../http/schemas.js";
import { InvalidCredentialError } from "../../shared/errors.js";
import { createRoute } from "../../shared/handler.utils.js";

/** Registration is the only unauthenticated route */
export const createUserRoute = createRoute(
  "user:create",
  userProfileSchema,
  async (profile, _route, { identityStore }) => {
    const { token } = await identityStore.createUser(profile);
    return { userToken: token };
  },
);

export const currentUserRoute = createRoute(
  "user:me",
  emptySchema,
  async (_payload, { credential }, { credentials }) => credentials.resolve(credential),
);

export const updateUserRoute = createRoute(
  "user:update",
  userProfileSchema,
  async (profile, { credential }, { credentials, identityStore }) => {
    const user = await credentials.resolve(credential);

    const updated = await identityStore.updateUser(user.userId, profile);
    if (!updated) throw new InvalidCredentialError();

    // resolve() succeeded, so the credential is present
    if (credential) await credentials.invalidate(credential);
    return {};
  },
);

export const registerUserRoutes = (fastify: FastifyInstance, context: AppContext) => {
  fastify.post("/user/create", createUserRoute(context));
  fastify.get("/user/me", currentUserRoute(context));
  fastify.post("/user/update", updateUserRoute(context));
};
