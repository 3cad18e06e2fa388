import 'dotenv/config';
import { getAuth } from 'firebase-admin/auth';
import { getFirestore } from 'firebase-admin/firestore';
import OpenAI from 'openai';
import { InMemoryHistoryStore, type HistoryStore } from '../src/services/historyStore';
import { MathSolvingService } from '../src/services/mathSolving';
import { OpenAIMathSolver, UnconfiguredMathSolver, type MathSolver } from '../src/services/openai';
import { createApp } from './app';
import { AuthGateway } from './auth';
import { loadConfig } from './config';
import { getFirebaseApp } from './firebase';
import { FirestoreHistoryStore } from './firestoreHistoryStore';

const config = loadConfig();

if (!config.openai.apiKey) {
  console.warn('⚠️ OpenAI API key not configured. Set OPENAI_API_KEY.');
}

if (!config.firebase && !config.firebaseProjectId) {
  console.warn('⚠️ Firebase not configured. Token verification will fail until FIREBASE_* variables are set.');
}

const firebaseApp = getFirebaseApp(config);

const solver: MathSolver = config.openai.apiKey
  ? new OpenAIMathSolver(
      new OpenAI({
        apiKey: config.openai.apiKey,
        baseURL: config.openai.baseURL,
      }),
      {
        model: config.openai.model,
        maxTokens: config.openai.maxTokens,
        maxRetries: config.openai.maxRetries,
      },
    )
  : new UnconfiguredMathSolver();

let history: HistoryStore;
if (config.historyStore === 'memory') {
  console.warn('⚠️ Using in-memory history store; history is lost on restart.');
  history = new InMemoryHistoryStore();
} else {
  history = new FirestoreHistoryStore(getFirestore(firebaseApp));
}

const app = createApp({
  config,
  service: new MathSolvingService(solver, history),
  authGateway: new AuthGateway(getAuth(firebaseApp)),
});

const server = app.listen(config.port, '0.0.0.0', () => {
  console.log(`🚀 Math Homework Solver API running on port ${config.port}`);
  console.log(`   Model: ${config.openai.model}, history store: ${config.historyStore}`);
});

// AI calls can take well over the default socket timeouts.
server.timeout = 300000;
server.keepAliveTimeout = 310000;
server.headersTimeout = 320000;
