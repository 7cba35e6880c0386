/**
 * Unit tests for Docker socket validation module
 */

import { describe, it, expect } from '@jest/globals';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { autoDetectDockerSocket, validateDockerSocket } from '@/infra/docker/socket-validation';

describe('Docker Socket Validation', () => {
  describe('autoDetectDockerSocket', () => {
    it('always returns a docker.sock path or a named pipe', () => {
      const socket = autoDetectDockerSocket();

      if (process.platform === 'win32') {
        expect(socket).toBe('npipe://./pipe/docker_engine');
      } else {
        expect(socket.endsWith('docker.sock')).toBe(true);
      }
    });
  });

  describe('validateDockerSocket', () => {
    it('passes named pipes through without a file check', () => {
      expect(validateDockerSocket('npipe://./pipe/docker_engine')).toEqual({
        dockerSocket: 'npipe://./pipe/docker_engine',
        warnings: [],
      });
    });

    it('rejects a regular file', () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'podgate-sock-'));
      const file = path.join(dir, 'docker.sock');
      fs.writeFileSync(file, '');

      try {
        const result = validateDockerSocket(file);

        expect(result.dockerSocket).toBe('');
        expect(result.warnings[0]).toBe(`${file} exists but is not a socket`);
        expect(result.warnings).toContain('No valid Docker socket found');
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });

    it('rejects a path that does not exist', () => {
      const missing = path.join(os.tmpdir(), 'podgate-no-such-dir', 'docker.sock');

      const result = validateDockerSocket(missing);

      expect(result.dockerSocket).toBe('');
      expect(result.warnings[0]?.startsWith(`Cannot access Docker socket: ${missing} - `)).toBe(true);
    });
  });
});
