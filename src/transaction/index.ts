export { type TransactionOptions, transaction } from "./transaction.js";
