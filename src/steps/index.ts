export * from './types';
export { PreValidateStep } from './pre-validate';
export { CreateSshKeyStep } from './create-ssh-key';
export { ResolveImageStep, mostRecent } from './resolve-image';
export { CreateServerStep } from './create-server';
export { WaitForServerStep } from './wait-for-server';
export { UpgradeServerTypeStep } from './upgrade-server-type';
export { RescueBootStep } from './rescue-boot';
export { WaitForConnectivityStep, buildConnectionTarget, serverAddress } from './wait-for-connectivity';
export { ProvisionStep } from './provision';
export { PowerOffStep } from './power-off';
export { CreateSnapshotStep } from './create-snapshot';
