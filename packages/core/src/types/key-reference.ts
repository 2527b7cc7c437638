export interface KeyReference {
	/** `<major>-<direction>-<number>`, e.g. `us-east-1`. */
	readonly region: string;
	/** Decimal account number, conventionally 12 digits. */
	readonly account: string;
	/** 8-4-4-4-12 lowercase hex. */
	readonly keyId: string;
}
