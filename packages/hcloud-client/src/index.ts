export * from './errors';
export * from './types';
export * from './labelSelector';
export * from './transport';
export * from './actions';
export * from './hcloudClient';
export * from './config';
export * from './schemas/action';
export * from './schemas/catalog';
export * from './schemas/common';
export * from './schemas/compute';
export * from './schemas/dns';
export * from './schemas/networking';
export * from './schemas/storage';
export * from './resources/base';
export * from './resources/actions';
export * from './resources/catalog';
export * from './resources/certificates';
export * from './resources/firewalls';
export * from './resources/floatingIps';
export * from './resources/images';
export * from './resources/loadBalancers';
export * from './resources/networks';
export * from './resources/placementGroups';
export * from './resources/primaryIps';
export * from './resources/servers';
export * from './resources/sshKeys';
export * from './resources/volumes';
export * from './resources/zones';
