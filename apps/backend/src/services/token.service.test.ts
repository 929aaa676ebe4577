import test, { after, before } from "node:test";
import assert from "node:assert/strict";
import Fastify, { type FastifyInstance } from "fastify";
import fastifyJwt from "@fastify/jwt";
import { createTokenIssuer, createTokenRevocationList, type TokenIssuer } from "./token.service.js";

const jwtConfig = {
  issuer: "coachgate",
  audience: "coachgate-users",
  accessExpiresMinutes: 30,
  refreshExpiresDays: 7,
};

const user = { id: "user-1", email: "coach@example.com" };

let app: FastifyInstance;
let otherApp: FastifyInstance;

async function signerApp(secret: string): Promise<FastifyInstance> {
  const instance = Fastify({ logger: false });
  await instance.register(fastifyJwt, { secret });
  await instance.ready();
  return instance;
}

function issuer(options: { clock?: () => number; audience?: string } = {}): TokenIssuer {
  return createTokenIssuer(app.jwt, {
    jwt: { ...jwtConfig, audience: options.audience ?? jwtConfig.audience },
    revocations: createTokenRevocationList(),
    clock: options.clock,
  });
}

before(async () => {
  app = await signerApp("test-secret");
  otherApp = await signerApp("other-test-secret");
});

after(async () => {
  await app.close();
  await otherApp.close();
});

test("issues a bearer pair whose access token verifies with the user's claims", () => {
  const tokens = issuer();
  const pair = tokens.issue(user);

  assert.equal(pair.tokenType, "bearer");
  assert.equal(pair.expiresIn, 1800);

  const verification = tokens.verify(pair.accessToken);
  assert.equal(verification.valid, true);
  if (verification.valid) {
    assert.equal(verification.claims.sub, "user-1");
    assert.equal(verification.claims.email, "coach@example.com");
    assert.equal(verification.claims.typ, "access");
    assert.equal(verification.claims.iss, "coachgate");
    assert.equal(verification.claims.aud, "coachgate-users");
    assert.equal(verification.claims.exp - verification.claims.iat, 1800);
  }
});

test("access and refresh tokens share a session but are not interchangeable", () => {
  const tokens = issuer();
  const pair = tokens.issue(user);

  const access = tokens.verify(pair.accessToken, "access");
  const refresh = tokens.verify(pair.refreshToken, "refresh");
  assert.ok(access.valid && refresh.valid);
  assert.equal(access.claims.sid, refresh.claims.sid);
  assert.notEqual(access.claims.jti, refresh.claims.jti);

  assert.deepEqual(tokens.verify(pair.refreshToken, "access"), { valid: false, reason: "invalid" });
  assert.deepEqual(tokens.verify(pair.accessToken, "refresh"), { valid: false, reason: "invalid" });
});

test("rejects tokens signed with another secret or for another audience", () => {
  const foreign = createTokenIssuer(otherApp.jwt, { jwt: jwtConfig, revocations: createTokenRevocationList() });
  const wrongAudience = issuer({ audience: "someone-else" });

  assert.deepEqual(issuer().verify(foreign.issue(user).accessToken), { valid: false, reason: "invalid" });
  assert.deepEqual(issuer().verify(wrongAudience.issue(user).accessToken), { valid: false, reason: "invalid" });
  assert.deepEqual(issuer().verify("not-a-token"), { valid: false, reason: "invalid" });
});

test("a token whose payload was swapped under the original signature is invalid", () => {
  const tokens = issuer();
  const [header, payload, signature] = tokens.issue(user).accessToken.split(".");
  assert.ok(header && payload && signature);

  const claims: unknown = JSON.parse(Buffer.from(payload, "base64url").toString("utf8"));
  assert.ok(typeof claims === "object" && claims !== null);
  const forged = Buffer.from(JSON.stringify({ ...claims, sub: "user-2" }), "utf8").toString("base64url");

  assert.deepEqual(tokens.verify(`${header}.${forged}.${signature}`), { valid: false, reason: "invalid" });
});

test("reports expiry once the access lifetime has passed", () => {
  const issuedAt = Date.now();
  const pair = issuer({ clock: () => issuedAt }).issue(user);

  const later = issuer({ clock: () => issuedAt + 31 * 60 * 1000 });
  assert.deepEqual(later.verify(pair.accessToken), { valid: false, reason: "expired" });
  assert.equal(later.verify(pair.refreshToken, "refresh").valid, true);
});

test("tokens whose exp has already passed in real time are expired", () => {
  const tokens = issuer({ clock: () => Date.now() - 2 * 60 * 60 * 1000 });
  const pair = tokens.issue(user);

  assert.deepEqual(issuer().verify(pair.accessToken), { valid: false, reason: "expired" });
});

test("revoking a session invalidates both of its tokens but not other sessions", () => {
  const tokens = issuer();
  const first = tokens.issue(user);
  const second = tokens.issue(user);

  const verification = tokens.verify(first.accessToken);
  assert.ok(verification.valid);
  tokens.revoke(verification.claims);

  assert.equal(tokens.verify(first.accessToken).valid, false);
  assert.equal(tokens.verify(first.refreshToken, "refresh").valid, false);
  assert.equal(tokens.verify(second.accessToken).valid, true);
});

test("revocation entries are pruned after they lapse", () => {
  let now = 1_000_000;
  const revocations = createTokenRevocationList(() => now);

  revocations.revoke("session-1", now + 1000);
  assert.equal(revocations.isRevoked("session-1"), true);

  now += 1000;
  assert.equal(revocations.isRevoked("session-1"), false);
  assert.equal(revocations.prune(), 1);
});
