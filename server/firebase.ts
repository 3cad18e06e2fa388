import { applicationDefault, cert, getApps, initializeApp, type App } from 'firebase-admin/app';
import type { AppConfig } from './config';

/**
 * Returns the default Firebase Admin app, initialising it on first use.
 * A service account from the environment wins; otherwise Application
 * Default Credentials are used.
 */
export function getFirebaseApp(config: Pick<AppConfig, 'firebase' | 'firebaseProjectId'>): App {
  const [existing] = getApps();
  if (existing) {
    return existing;
  }

  if (config.firebase) {
    console.log(`🔥 Initializing Firebase Admin for project ${config.firebase.projectId}`);
    return initializeApp({
      credential: cert({
        projectId: config.firebase.projectId,
        clientEmail: config.firebase.clientEmail,
        privateKey: config.firebase.privateKey,
      }),
      projectId: config.firebase.projectId,
    });
  }

  console.warn('⚠️ Firebase service account not configured; falling back to Application Default Credentials.');
  return initializeApp({
    credential: applicationDefault(),
    projectId: config.firebaseProjectId,
  });
}
