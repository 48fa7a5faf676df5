export enum RoleEnum {
  host = 'host',
  security = 'security',
  admin = 'admin',
}
