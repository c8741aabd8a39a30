export { WalletAccount, type WalletAccountInit } from "./account.js";
export { createWalletAccountContext, type WalletAccountContext } from "./context.js";
