/**
 * Request and response shapes of the civic issues REST API
 */

export interface TokenResponse {
  access_token: string;
  token_type: string;
}

/**
 * Profile submitted on sign-up. `email` and `password` are reused for the
 * login that follows registration.
 */
export interface RegistrationProfile {
  fullName: string;
  email: string;
  password: string;
  district: string;
  pincode?: string;
}

export interface IssueDraft {
  title: string;
  description: string;
  category: string;
  district: string;
  latitude: number;
  longitude: number;
  photo: Blob;
  /** Defaults to a timestamped .jpg name */
  photoName?: string;
}

export interface TaskCompletion {
  taskId: number;
  proofPhoto: Blob;
  latitude: number;
  longitude: number;
  proofPhotoName?: string;
}
