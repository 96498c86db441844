/**
 * Estadisticas simples: examenes por mes de cierre.
 */
import type { Examen } from './validacionesExamenes';

export type ConteoMensual = {
  /** `YYYY-MM` */
  mes: string;
  etiqueta: string;
  cantidad: number;
};

const formatoMes = new Intl.DateTimeFormat('es', { month: 'long', year: 'numeric', timeZone: 'UTC' });

function etiquetaMes(mes: string) {
  const [anio, numeroMes] = mes.split('-').map(Number);
  return formatoMes.format(new Date(Date.UTC(anio, numeroMes - 1, 1)));
}

export function contarExamenesPorMes(examenes: ReadonlyArray<Pick<Examen, 'fechaFin'>>): ConteoMensual[] {
  const conteo = new Map<string, number>();
  for (const examen of examenes) {
    const mes = examen.fechaFin.slice(0, 7);
    conteo.set(mes, (conteo.get(mes) ?? 0) + 1);
  }

  return [...conteo.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([mes, cantidad]) => ({ mes, etiqueta: etiquetaMes(mes), cantidad }));
}
