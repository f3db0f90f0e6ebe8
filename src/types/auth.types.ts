export enum Role {
  CUSTOMER = 'CUSTOMER',
  SURVEYOR = 'SURVEYOR',
  OFFICER = 'OFFICER',
  MANAGER = 'MANAGER',
  DIRECTOR = 'DIRECTOR',
  ADMIN = 'ADMIN',
}

/** Higher rank implies every lower role's approval authority. */
export const ROLE_RANK: Record<Role, number> = {
  [Role.CUSTOMER]: 0,
  [Role.SURVEYOR]: 1,
  [Role.OFFICER]: 2,
  [Role.MANAGER]: 3,
  [Role.DIRECTOR]: 4,
  [Role.ADMIN]: 5,
};

export const HIGHEST_ROLE = Role.ADMIN;

/** An already-authenticated user acting on the engine. */
export interface Actor {
  userId: string;
  email?: string;
  roles: Role[];
}

export interface AuthTokenPayload {
  userId: string;
  email: string;
  roles: Role[];
}
