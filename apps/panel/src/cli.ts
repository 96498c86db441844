/**
 * Punto de entrada de terminal del panel.
 */
import { readFile } from 'node:fs/promises';
import { ejecutarPanel } from './comandosPanel';
import { fechaHoy } from './compartido/utilidades/fechas';
import { configuracion } from './configuracion';
import { logError } from './infraestructura/logging/logger';
import { crearServiciosPanel } from './panel';

async function iniciar() {
  const codigo = await ejecutarPanel(process.argv.slice(2), {
    servicios: crearServiciosPanel(configuracion),
    escribir: (linea) => console.log(linea),
    leerArchivo: (ruta) => readFile(ruta, 'utf8'),
    hoy: () => fechaHoy()
  });
  process.exitCode = codigo;
}

iniciar().catch((error) => {
  logError('Error inesperado en el panel', error);
  process.exit(1);
});
