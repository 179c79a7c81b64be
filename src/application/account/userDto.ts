import { User } from '../../domain/auth/user.js';

/**
 * Account representation returned to the owner of the account.
 * Never carries the password hash or the activation and reset keys.
 */
export interface UserDTO {
  id: string;
  login: string;
  firstName: string | null;
  lastName: string | null;
  email: string;
  imageUrl: string | null;
  activated: boolean;
  langKey: string;
  address: string | null;
  phoneNumber: string | null;
  identityCardNumber: string | null;
  createdDate: string;
  lastModifiedDate: string;
  authorities: string[];
}

export function toUserDto(user: User): UserDTO {
  return {
    id: user.id,
    login: user.login,
    firstName: user.firstName,
    lastName: user.lastName,
    email: user.email,
    imageUrl: user.imageUrl,
    activated: user.activated,
    langKey: user.langKey,
    address: user.address,
    phoneNumber: user.phoneNumber,
    identityCardNumber: user.identityCardNumber,
    createdDate: user.createdAt.toISOString(),
    lastModifiedDate: user.updatedAt.toISOString(),
    authorities: [...user.authorities],
  };
}
