import * as readline from 'readline';
import { CryptoService } from '../infrastructure/auth/CryptoService';

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout
});

const question = (prompt: string): Promise<string> => {
  return new Promise((resolve) => {
    rl.question(prompt, (answer) => {
      resolve(answer);
    });
  });
};

async function encryptSettlementKey() {
  try {
    console.log('=== Settlement Key Encryption Tool ===\n');

    const privateKey = await question('Enter the settlement signer private key: ');
    process.env.ENCRYPTION_KEY = await question('Enter your encryption key (min 32 chars): ');

    const encrypted = new CryptoService().encrypt(privateKey.trim());

    console.log('\n=== Encrypted Private Key ===');
    console.log(encrypted);
    console.log('\nAdd this to your .env file as SETTLEMENT_PRIVATE_KEY_ENCRYPTED');
    console.log('Make sure to keep your ENCRYPTION_KEY secure!');
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  } finally {
    rl.close();
  }
}

void encryptSettlementKey();
