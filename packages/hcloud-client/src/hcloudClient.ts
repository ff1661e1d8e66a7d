import { waitForAction, waitForActions } from './actions';
import type { WaitForActionOptions } from './actions';
import { ActionsClient } from './resources/actions';
import {
  DatacentersClient,
  IsosClient,
  LoadBalancerTypesClient,
  LocationsClient,
  PricingClient,
  ServerTypesClient
} from './resources/catalog';
import { CertificatesClient } from './resources/certificates';
import { FirewallsClient } from './resources/firewalls';
import { FloatingIpsClient } from './resources/floatingIps';
import { ImagesClient } from './resources/images';
import { LoadBalancersClient } from './resources/loadBalancers';
import { NetworksClient } from './resources/networks';
import { PlacementGroupsClient } from './resources/placementGroups';
import { PrimaryIpsClient } from './resources/primaryIps';
import { ServersClient } from './resources/servers';
import { SshKeysClient } from './resources/sshKeys';
import { VolumesClient } from './resources/volumes';
import { ZonesClient } from './resources/zones';
import type { Action } from './schemas/action';
import { HcloudTransport } from './transport';
import type { HcloudTransportOptions } from './types';

/**
 * Entry point: one transport shared by every resource client. Pass options to
 * build the transport, or an existing transport to share it.
 */
export class HcloudClient {
  readonly transport: HcloudTransport;
  readonly actions: ActionsClient;
  readonly certificates: CertificatesClient;
  readonly datacenters: DatacentersClient;
  readonly firewalls: FirewallsClient;
  readonly floatingIps: FloatingIpsClient;
  readonly images: ImagesClient;
  readonly isos: IsosClient;
  readonly loadBalancers: LoadBalancersClient;
  readonly loadBalancerTypes: LoadBalancerTypesClient;
  readonly locations: LocationsClient;
  readonly networks: NetworksClient;
  readonly placementGroups: PlacementGroupsClient;
  readonly pricing: PricingClient;
  readonly primaryIps: PrimaryIpsClient;
  readonly servers: ServersClient;
  readonly serverTypes: ServerTypesClient;
  readonly sshKeys: SshKeysClient;
  readonly volumes: VolumesClient;
  readonly zones: ZonesClient;
  private readonly pollDefaults: WaitForActionOptions;

  /** `pollDefaults` apply to every `waitForAction` call; per-call options win. */
  constructor(transportOrOptions: HcloudTransport | HcloudTransportOptions, pollDefaults: WaitForActionOptions = {}) {
    const transport =
      transportOrOptions instanceof HcloudTransport ? transportOrOptions : new HcloudTransport(transportOrOptions);
    this.transport = transport;
    this.pollDefaults = pollDefaults;
    this.actions = new ActionsClient(transport);
    this.certificates = new CertificatesClient(transport);
    this.datacenters = new DatacentersClient(transport);
    this.firewalls = new FirewallsClient(transport);
    this.floatingIps = new FloatingIpsClient(transport);
    this.images = new ImagesClient(transport);
    this.isos = new IsosClient(transport);
    this.loadBalancers = new LoadBalancersClient(transport);
    this.loadBalancerTypes = new LoadBalancerTypesClient(transport);
    this.locations = new LocationsClient(transport);
    this.networks = new NetworksClient(transport);
    this.placementGroups = new PlacementGroupsClient(transport);
    this.pricing = new PricingClient(transport);
    this.primaryIps = new PrimaryIpsClient(transport);
    this.servers = new ServersClient(transport);
    this.serverTypes = new ServerTypesClient(transport);
    this.sshKeys = new SshKeysClient(transport);
    this.volumes = new VolumesClient(transport);
    this.zones = new ZonesClient(transport);
  }

  waitForAction(action: Action | number, options?: WaitForActionOptions): Promise<Action> {
    return waitForAction(this.actions, action, { ...this.pollDefaults, ...options });
  }

  waitForActions(actions: readonly (Action | number)[], options?: WaitForActionOptions): Promise<Action[]> {
    return waitForActions(this.actions, actions, { ...this.pollDefaults, ...options });
  }
}
