import { has, hasNot, Maybe } from '../shared/maybe';

/**
 * Decides whether a scanned identifier is allowed.
 *
 * Returns the rejection message, or nothing when the identifier is fine.
 * Keywords never reach a validator.
 */
export type IdentifierValidator = (candidate: string) => Maybe<string>;

export const lowercaseLMessage = "'l' faiLs the ELi Linter";

/** The ELi Linter forbids a lowercase `l` anywhere in an identifier */
export const forbidLowercaseL: IdentifierValidator = (candidate) =>
	candidate.includes('l') ? has(lowercaseLMessage) : hasNot();

export const allowAllIdentifiers: IdentifierValidator = () => hasNot();
