/**
 * @framewire/testing-contracts
 *
 * Contract suites every framewire transport runs against itself, so the
 * in-process and network transports are held to the same behaviour.
 */

export {
  runConnectionContractTests,
  type ConnectionPair,
  type ConnectionTestContext,
  type ConnectionTestRunner,
} from './lib/connection-contract-tests';

export {
  runAcceptLoopContractTests,
  type AcceptLoopTestContext,
  type AcceptLoopTestRunner,
} from './lib/accept-loop-contract-tests';
