import admin from "firebase-admin";
import fs from "node:fs";

export interface FirebaseCredentials {
  serviceAccountJson?: string;
  credentialsPath?: string;
}

/** Returns null when no Firebase credentials are configured (file storage is used instead). */
export function initializeFirestore(credentials: FirebaseCredentials): admin.firestore.Firestore | null {
  let credential: admin.credential.Credential;

  if (credentials.serviceAccountJson) {
    credential = admin.credential.cert(JSON.parse(credentials.serviceAccountJson));
  } else if (credentials.credentialsPath) {
    const p = credentials.credentialsPath;
    if (!fs.existsSync(p)) {
      throw new Error(`GOOGLE_APPLICATION_CREDENTIALS not found at: ${p}`);
    }
    credential = admin.credential.cert(p);
  } else {
    return null;
  }

  const app = admin.apps.length ? admin.app() : admin.initializeApp({ credential });
  return admin.firestore(app);
}
