import BigNumber from 'bignumber.js';
import { BigNumber as EthersBigNumber, utils } from 'ethers';
import { NodeLog, Transfer } from './ledger.types';

// keccak256("Transfer(address,address,uint256)")
export const TRANSFER_EVENT_TOPIC =
  '0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef';

export const ERC20_INTERFACE = new utils.Interface([
  'function symbol() view returns (string)',
  'function transfer(address to, uint256 value) returns (bool)',
]);

export function isTransferLog(log: NodeLog): boolean {
  return (
    log.topics.length > 0 &&
    log.topics[0].toLowerCase() === TRANSFER_EVENT_TOPIC
  );
}

const isWord = (topic: string): boolean => utils.isHexString(topic, 32);

/**
 * Decodes an ERC20 `Transfer` log. Returns null for other events and for
 * Transfer logs that are missing indexed topics or carry undecodable data.
 */
export function decodeTransferLog(log: NodeLog): Transfer | null {
  if (!isTransferLog(log) || log.topics.length < 3) {
    return null;
  }
  const [, fromTopic, toTopic] = log.topics;
  if (!isWord(fromTopic) || !isWord(toTopic) || !utils.isHexString(log.data)) {
    return null;
  }

  const value =
    log.data === '0x'
      ? new BigNumber(0)
      : new BigNumber(EthersBigNumber.from(log.data).toString());

  return {
    asset: 'token',
    from: utils.hexDataSlice(fromTopic, 12),
    to: utils.hexDataSlice(toTopic, 12),
    value,
  };
}
