import { RoleEnum } from '../roles.enum';

export type PrincipalGrant = {
  principalId: string;
  role: RoleEnum;
};

export type RolesConfig = {
  principals: PrincipalGrant[];
};
