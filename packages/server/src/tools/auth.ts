import { z } from "zod";
import {
  describeOAuthConfig,
  getAuthState,
  toAuthorizationPayload,
  toTokenPayload,
} from "../oauthHelpers";
import { defineTool, type Tool } from "./types";

export const authTools: Tool[] = [
  defineTool({
    name: "create_authorization_url",
    description: "Start an authorization-code + PKCE login. Returns the URL to open and the verifier and state to keep.",
    kind: "auth",
    input: z.object({ scopes: z.array(z.string().min(1)).optional() }),
    handler: ({ scopes }, { runtime }) =>
      toAuthorizationPayload(runtime.authorization.createAuthorizationUrl(scopes)),
  }),

  defineTool({
    name: "exchange_code_for_token",
    description: "Exchange the authorization code from the redirect for tokens.",
    kind: "auth",
    input: z.object({
      code: z.string().min(1),
      code_verifier: z.string().min(1),
      state: z.string().min(1),
      received_state: z.string().min(1),
    }),
    handler: async (input, { runtime, signal }) => {
      const credential = await runtime.authorization.exchange(
        {
          code: input.code,
          codeVerifier: input.code_verifier,
          expectedState: input.state,
          receivedState: input.received_state,
        },
        signal
      );
      return { authenticated: true, ...toTokenPayload(credential) };
    },
  }),

  defineTool({
    name: "refresh_access_token",
    description: "Refresh the stored access token now, regardless of its expiry.",
    kind: "auth",
    input: z.object({}),
    handler: async (_input, { runtime, signal }) => {
      const credential = await runtime.tokens.refresh(signal);
      return { refreshed: true, ...toTokenPayload(credential) };
    },
  }),

  defineTool({
    name: "get_oauth_config",
    description: "Show the OAuth client configuration and the current authentication state.",
    kind: "auth",
    input: z.object({}),
    handler: async (_input, { runtime }) => ({
      ...describeOAuthConfig(runtime.config),
      auth: getAuthState(await runtime.store.get(), runtime.now()),
    }),
  }),

  defineTool({
    name: "clear_tokens",
    description: "Forget the stored credential. The provider-side grant is left as is.",
    kind: "auth",
    input: z.object({}),
    handler: async (_input, { runtime }) => {
      const had = (await runtime.store.get()) !== null;
      await runtime.store.clear();
      return { cleared: had };
    },
  }),
];
