// Path utilities for cross-platform folder names and file name handling

import * as path from 'path';
import { PathSanitizationResult } from './types';

/**
 * Reserved file names on Windows
 */
const WINDOWS_RESERVED_NAMES = [
  'CON', 'PRN', 'AUX', 'NUL',
  'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
  'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9'
];

/**
 * Maximum path length for different operating systems
 */
const MAX_PATH_LENGTH = {
  windows: 260,
  unix: 4096
};

/**
 * Maximum filename length (conservative across platforms)
 */
const MAX_FILENAME_LENGTH = 255;

export class PathUtils {
  /**
   * Sanitize a single folder name component. Separators never create
   * unintended nesting, reserved characters are replaced.
   */
  static sanitizeFolderName(component: string): PathSanitizationResult {
    const unsafeChars: string[] = [];
    let sanitized = component;

    // Path separators and colons become hyphens
    sanitized = sanitized.replace(/[/\\:]/g, (match) => {
      unsafeChars.push(match);
      return '-';
    });

    // Other reserved characters become underscores
    sanitized = sanitized.replace(/[<>"|?*\x00-\x1f]/g, (match) => {
      unsafeChars.push(match);
      return '_';
    });

    // Collapse runs of separators
    sanitized = sanitized.replace(/[-_]{2,}/g, (match) => {
      if (/^-+$/.test(match)) return '-';
      if (/^_+$/.test(match)) return '_';
      return '-';
    });

    sanitized = sanitized.replace(/^[.\s]+/g, '').replace(/[.\s]+$/g, '');

    if (/^[-_]*$/.test(sanitized)) {
      sanitized = '';
    }

    if (process.platform === 'win32' && WINDOWS_RESERVED_NAMES.includes(sanitized.toUpperCase())) {
      sanitized = `_${sanitized}`;
    }

    if (!sanitized) {
      sanitized = 'Unnamed';
    }

    if (sanitized.length > MAX_FILENAME_LENGTH) {
      sanitized = sanitized.substring(0, MAX_FILENAME_LENGTH);
    }

    return {
      sanitized,
      changed: sanitized !== component,
      originalUnsafeChars: unsafeChars.length > 0 ? [...new Set(unsafeChars)] : undefined
    };
  }

  /**
   * Sanitize a relative folder path (e.g. a custom date pattern "2024/03") segment by segment
   */
  static sanitizeRelativeFolderPath(folderPath: string): string {
    const segments = folderPath.split(/[/\\]+/).filter((segment) => segment.length > 0);
    if (segments.length === 0) {
      return 'Unnamed';
    }
    return segments.map((segment) => this.sanitizeFolderName(segment).sanitized).join(path.sep);
  }

  /**
   * Split a file name into stem and its final extension only ("a.tar.gz" -> "a.tar" + ".gz")
   */
  static splitExtension(fileName: string): { stem: string; extension: string } {
    const extension = path.extname(fileName);
    return {
      stem: extension ? fileName.slice(0, -extension.length) : fileName,
      extension
    };
  }

  /**
   * Lowercased suffixes of a file name, leading dots ignored ("Photo.TAR.GZ" -> ["tar", "gz"])
   */
  static getSuffixes(fileName: string): string[] {
    const parts = path.basename(fileName).replace(/^\.+/, '').toLowerCase().split('.');
    return parts.slice(1).filter((part) => part.length > 0);
  }

  static numberedFileName(fileName: string, counter: number): string {
    const { stem, extension } = this.splitExtension(fileName);
    return `${stem}_${counter}${extension}`;
  }

  static timestampedFileName(fileName: string, timestamp: string): string {
    const { stem, extension } = this.splitExtension(fileName);
    return `${stem}_${timestamp}${extension}`;
  }

  static isHidden(name: string): boolean {
    return name.startsWith('.');
  }

  /**
   * Check if a path is safe and valid
   */
  static isValidPath(filePath: string): boolean {
    if (!filePath || filePath.includes('\0')) {
      return false;
    }

    const maxLength = process.platform === 'win32' ? MAX_PATH_LENGTH.windows : MAX_PATH_LENGTH.unix;
    return path.resolve(filePath).length <= maxLength;
  }
}
