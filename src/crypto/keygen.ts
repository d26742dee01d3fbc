#!/usr/bin/env tsx

import { resolve } from 'path';
import { homedir } from 'os';
import { generateKeyPair, saveKeyPair, loadKeyPair } from './signer.js';

const DEFAULT_KEY_DIR = resolve(homedir(), '.guardrail', 'keys');

async function main(): Promise<void> {
  const keyDir = process.argv[2] || DEFAULT_KEY_DIR;

  console.log('Audit signing key generator');
  console.log('─'.repeat(40));
  console.log(`Key directory: ${keyDir}`);

  const existing = loadKeyPair(keyDir);
  if (existing) {
    console.log('\nKeys already exist at this location.');
    console.log('To regenerate, delete the existing keys first:');
    console.log(`  rm -rf ${keyDir}`);
    process.exit(1);
  }

  console.log('\nGenerating Ed25519 key pair...');
  saveKeyPair(keyDir, generateKeyPair());

  console.log('\nKeys generated:');
  console.log(`  Private key: ${keyDir}/audit-signing.key (mode 600)`);
  console.log(`  Public key:  ${keyDir}/audit-signing.pub (mode 644)`);
  console.log('\nSet audit.key_dir in guardrail.yaml to sign every audit entry.');
  console.log('Keep the private key out of version control; entries signed with a lost key can still be chain-verified but not signature-verified.');
}

main().catch(error => {
  console.error(error);
  process.exit(1);
});
