// RLP encoding of identities, the input to the account address salt.

import * as rlp from "rlp";
import { utf8ToBytes } from "@noble/hashes/utils";
import type { Identity } from "../core/types";
import { fromHex } from "../utils/bytes";

/* strings go in as utf-8 so a chainId like "0x1" is never read as hex */
export const encIdentity = (id: Identity): Uint8Array =>
  rlp.encode([
    utf8ToBytes(id.chainNamespace),
    utf8ToBytes(id.chainId),
    fromHex(id.owner),
  ]);
