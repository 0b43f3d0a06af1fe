/**
 * SerialPortHandle backed by the `serialport` package
 */

import { ReadlineParser, SerialPort } from 'serialport';

import type { SerialPortHandle, SerialPortListeners, SerialPortOptions } from './types';

/**
 * Create a handle for one OS serial port. The port is not opened here.
 */
export function createNodeSerialPort(options: SerialPortOptions, listeners: SerialPortListeners): SerialPortHandle {
  const port = new SerialPort({ path: options.path, baudRate: options.baudRate, autoOpen: false });
  const parser = port.pipe(new ReadlineParser({ delimiter: options.delimiter, encoding: 'utf8' }));

  parser.on('data', function(line: string) {
    listeners.onLine(line);
  });
  port.on('error', function(err: Error) {
    listeners.onError(err);
  });
  port.on('close', function() {
    listeners.onClose();
  });

  return {
    isOpen: function() {
      return port.isOpen;
    },

    open: function() {
      return new Promise<void>(function(resolve, reject) {
        port.open(function(err) {
          if (err) {
            reject(err);
            return;
          }
          resolve();
        });
      });
    },

    flush: function() {
      return new Promise<void>(function(resolve, reject) {
        port.flush(function(err) {
          if (err) {
            reject(err);
            return;
          }
          resolve();
        });
      });
    },

    write: function(data: string) {
      return new Promise<void>(function(resolve, reject) {
        port.write(data, function(writeErr) {
          if (writeErr) {
            reject(writeErr);
            return;
          }
          port.drain(function(drainErr) {
            if (drainErr) {
              reject(drainErr);
              return;
            }
            resolve();
          });
        });
      });
    },

    close: function() {
      return new Promise<void>(function(resolve, reject) {
        if (!port.isOpen) {
          resolve();
          return;
        }
        port.close(function(err) {
          if (err) {
            reject(err);
            return;
          }
          resolve();
        });
      });
    }
  };
}
