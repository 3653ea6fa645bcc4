import type { INestApplication } from "@nestjs/common";
import { bytesToHex } from "@noble/hashes/utils";
import { schnorr } from "@noble/secp256k1";
import request from "supertest";
import {
	SIGNATURE_HEADER,
	SIGNER_HEADER,
	TIMESTAMP_HEADER,
	serializeBody,
	signedRequestDigest,
} from "../src/auth/signed-request";
import { ADMIN_PASS, ADMIN_USER, type TestParty } from "./parties";

type Method = "GET" | "POST" | "PATCH";

export async function signRequest(
	party: TestParty,
	method: Method,
	path: string,
	body?: object,
	timestamp: number = Date.now(),
): Promise<Record<string, string>> {
	const digest = signedRequestDigest({
		timestamp: String(timestamp),
		method,
		path,
		body: serializeBody(body),
	});
	const signature = await schnorr.sign(digest, party.privateKey);
	return {
		[SIGNER_HEADER]: party.publicKey,
		[TIMESTAMP_HEADER]: String(timestamp),
		[SIGNATURE_HEADER]: bytesToHex(signature),
	};
}

/**
 * Sends a request signed by `party`; `path` must match the request URL
 * exactly, query string included.
 */
export async function signed(
	app: INestApplication,
	party: TestParty,
	method: Method,
	path: string,
	body?: object,
): Promise<request.Response> {
	const headers = await signRequest(party, method, path, body);
	const server = request(app.getHttpServer());
	const req =
		method === "POST"
			? server.post(path)
			: method === "PATCH"
				? server.patch(path)
				: server.get(path);
	req.set(headers);
	return body === undefined ? req : req.send(body);
}

export function adminAuth(): string {
	return `Basic ${Buffer.from(`${ADMIN_USER}:${ADMIN_PASS}`).toString("base64")}`;
}

export async function creditWallet(
	app: INestApplication,
	party: TestParty,
	amount: string,
): Promise<void> {
	await request(app.getHttpServer())
		.post(`/api/admin/v1/wallets/${party.publicKey}/credit`)
		.set("Authorization", adminAuth())
		.send({ amount })
		.expect(200);
}

export async function balanceOf(app: INestApplication, party: TestParty): Promise<string> {
	const res = await request(app.getHttpServer())
		.get(`/api/v1/wallets/${party.publicKey}`)
		.expect(200);
	return res.body.data.balance;
}

export const EVIDENCE = {
	buyer: "0b".repeat(32),
	seller: "0c".repeat(32),
	explanation: "0e".repeat(32),
};
