/**
 * Supplies the password for one operation. The CLI backs this with a masked
 * prompt; tests and embedders pass a constant.
 */
export type PasswordSource = () => string | Promise<string>;
