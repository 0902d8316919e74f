/**
 * @framewire/transport-inmemory
 *
 * In-process transport: virtual connections between two parties in the same
 * process, addressed by `inproc://name` endpoints and brokered by a
 * VirtualTransportRegistry instance.
 */

export {
  type VirtualConnection,
  type VirtualConnectionPair,
  makeVirtualConnectionPair,
} from './lib/virtual-connection';

export {
  VirtualTransportRegistry,
  type VirtualTransportRegistryService,
  type PendingConnections,
  makeVirtualTransportRegistry,
  VirtualTransportRegistryDefault,
} from './lib/virtual-transport-registry';

export { makeVirtualAcceptLoop, makeVirtualConnector } from './lib/virtual-accept-loop';
